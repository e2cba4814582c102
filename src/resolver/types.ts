// src/resolver/types.ts
import { ConfigNode } from '../loader/config-node.js';

/**
 * Structural scope a search pattern targets. Used for diagnostics only;
 * precedence comes from the order of patterns in a ScopePath.
 */
export type ScopeKind = 'device-group' | 'shared' | 'global' | 'template' | 'device' | 'vsys' | 'rulebase';

export interface ScopePattern {
    scope: ScopeKind;
    /** XPath expression evaluated against the whole document. */
    xpath: string;
}

/** Ordered list of patterns; later content-bearing matches override earlier ones. */
export type ScopePath = readonly ScopePattern[];

export type ObjectType =
    | 'device-group'
    | 'tag'
    | 'region'
    | 'custom-url-category'
    | 'application-group'
    | 'application-filter'
    | 'external-list'
    | 'schedule'
    | 'address'
    | 'address-group'
    | 'service'
    | 'service-group'
    | 'security-rule'
    | 'nat-rule'
    | 'decryption-rule'
    | 'pbf-rule'
    | 'application-override-rule'
    | 'zone'
    | 'ethernet-interface'
    | 'aggregate-interface'
    | 'aggregate-subinterface'
    | 'vlan-interface'
    | 'loopback-interface'
    | 'tunnel-interface'
    | 'antivirus-profile'
    | 'vulnerability-profile'
    | 'anti-spyware-profile'
    | 'url-filtering-profile'
    | 'file-blocking-profile'
    | 'wildfire-analysis-profile'
    | 'security-profile-group'
    | 'zone-protection-profile'
    | 'log-forwarding-profile'
    | 'qos-profile'
    | 'tunnel-monitor-profile'
    | 'ike-gateway'
    | 'ipsec-tunnel'
    | 'ike-crypto-profile'
    | 'ipsec-crypto-profile';

export type FieldValue = string | boolean | null | readonly string[] | FieldMap | readonly FieldMap[];

export interface FieldMap {
    readonly [field: string]: FieldValue;
}

export type FieldExtractor = (node: ConfigNode) => FieldValue;

export type FieldExtractors = Readonly<Record<string, FieldExtractor>>;

export type StubPredicate = (node: ConfigNode) => boolean;

/**
 * How two full definitions of the same name are reconciled.
 * - `last-full-wins`: every later full definition overwrites the stored one.
 * - `first-wins`: the first full definition is kept.
 * Stub placeholders are replaced by the first full definition under both policies.
 */
export type CollisionPolicy = 'last-full-wins' | 'first-wins';

export interface ObjectTypeDescriptor {
    type: ObjectType;
    /** Human-readable plural used in summaries. */
    label: string;
    scopes: ScopePath;
    isStub: StubPredicate;
    collision: CollisionPolicy;
    fields: FieldExtractors;
}

export type Completeness = 'stub' | 'full';

export type ScopeLocation =
    | { kind: 'shared' }
    | { kind: 'device-group'; name: string }
    | { kind: 'template'; name: string }
    | { kind: 'template-stack'; name: string }
    | { kind: 'device'; name: string }
    | { kind: 'root' };

export interface ObjectOrigin {
    /** Scope of the pattern that produced the entry. */
    scope: ScopeKind;
    /** Where the node actually sits in the document. */
    location: ScopeLocation;
}

export interface NamedObject {
    readonly type: ObjectType;
    readonly name: string;
    readonly completeness: Completeness;
    readonly origin: ObjectOrigin;
    readonly fields: FieldMap;
    readonly node: ConfigNode;
}
