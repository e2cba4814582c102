// src/resolver/scope-resolver.ts
import winston from 'winston';
import { ConfigNode, nameOf } from '../loader/config-node.js';
import { ConfigTree } from '../loader/tree-loader.js';
import { createContextLogger } from '../utils/logger.js';
import { extractFields } from './field-extractors.js';
import { OBJECT_TYPES } from './object-types.js';
import {
    Completeness,
    NamedObject,
    ObjectType,
    ObjectTypeDescriptor,
    ScopeLocation,
    ScopePattern,
} from './types.js';

/**
 * Resolved objects of one type, keyed by name.
 *
 * Iteration follows first-insertion order even when an entry's content has
 * since been replaced by a later definition.
 */
export class Catalog {
    private readonly entries = new Map<string, NamedObject>();

    constructor(public readonly type: ObjectType) {}

    get size(): number {
        return this.entries.size;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get(name: string): NamedObject | undefined {
        return this.entries.get(name);
    }

    names(): string[] {
        return [...this.entries.keys()];
    }

    values(): NamedObject[] {
        return [...this.entries.values()];
    }

    countBy(completeness: Completeness): number {
        return this.values().filter(entry => entry.completeness === completeness).length;
    }

    /** @internal used by the resolver */
    record(entry: NamedObject): void {
        this.entries.set(entry.name, entry);
    }

    toJSON(): Array<{ name: string; completeness: Completeness; origin: NamedObject['origin']; fields: NamedObject['fields'] }> {
        return this.values().map(({ name, completeness, origin, fields }) => ({ name, completeness, origin, fields }));
    }
}

export type CatalogSet = Map<ObjectType, Catalog>;

/**
 * Determines where a node sits from its ancestry. Management scopes win over
 * the device entries nested inside them: a device entry inside a template is
 * reported as that template.
 */
export function locate(tree: ConfigTree, node: ConfigNode): ScopeLocation {
    const deviceGroup = tree.enclosingEntryName(node, 'device-group');
    if (deviceGroup !== undefined) {
        return { kind: 'device-group', name: deviceGroup };
    }
    const template = tree.enclosingEntryName(node, 'template');
    if (template !== undefined) {
        return { kind: 'template', name: template };
    }
    const stack = tree.enclosingEntryName(node, 'template-stack');
    if (stack !== undefined) {
        return { kind: 'template-stack', name: stack };
    }
    if (node.tag === 'shared' || tree.ancestors(node).some(ancestor => ancestor.tag === 'shared')) {
        return { kind: 'shared' };
    }
    const device = tree.enclosingEntryName(node, 'devices');
    if (device !== undefined) {
        return { kind: 'device', name: device };
    }
    return { kind: 'root' };
}

function toNamedObject(
    tree: ConfigTree,
    descriptor: ObjectTypeDescriptor,
    pattern: ScopePattern,
    node: ConfigNode,
    name: string,
    completeness: Completeness,
): NamedObject {
    return Object.freeze({
        type: descriptor.type,
        name,
        completeness,
        origin: { scope: pattern.scope, location: locate(tree, node) },
        fields: Object.freeze(extractFields(node, descriptor.fields)),
        node,
    });
}

/**
 * Builds the catalog for one object type.
 *
 * Patterns are scanned in order. A stub only claims a name nobody has claimed yet;
 * a full definition replaces whatever is stored unless the descriptor keeps the
 * first full definition. A stub therefore never survives a full definition of the
 * same name, whichever order they are found in.
 */
export function resolve(tree: ConfigTree, descriptor: ObjectTypeDescriptor): Catalog {
    const catalog = new Catalog(descriptor.type);

    for (const pattern of descriptor.scopes) {
        for (const node of tree.select(pattern.xpath)) {
            const name = nameOf(node);
            if (name === undefined) {
                continue;
            }

            const existing = catalog.get(name);
            if (descriptor.isStub(node)) {
                if (existing === undefined) {
                    catalog.record(toNamedObject(tree, descriptor, pattern, node, name, 'stub'));
                }
                continue;
            }

            if (descriptor.collision === 'first-wins' && existing?.completeness === 'full') {
                continue;
            }
            catalog.record(toNamedObject(tree, descriptor, pattern, node, name, 'full'));
        }
    }

    return catalog;
}

/**
 * Runs the descriptor table over a loaded tree.
 */
export class ScopeResolver {
    private readonly logger: winston.Logger;

    constructor(
        private readonly tree: ConfigTree,
        private readonly descriptors: readonly ObjectTypeDescriptor[] = OBJECT_TYPES,
        logger?: winston.Logger,
    ) {
        this.logger = logger ?? createContextLogger('ScopeResolver');
    }

    resolveType(type: ObjectType): Catalog {
        const descriptor = this.descriptors.find(candidate => candidate.type === type);
        if (descriptor === undefined) {
            this.logger.warn(`No descriptor registered for object type ${type}`);
            return new Catalog(type);
        }
        return this.run(descriptor);
    }

    /**
     * Resolves every registered type, or only `types` when given.
     */
    resolveAll(types?: readonly ObjectType[]): CatalogSet {
        const catalogs: CatalogSet = new Map();
        for (const descriptor of this.descriptors) {
            if (types && !types.includes(descriptor.type)) {
                continue;
            }
            catalogs.set(descriptor.type, this.run(descriptor));
        }
        return catalogs;
    }

    private run(descriptor: ObjectTypeDescriptor): Catalog {
        const catalog = resolve(this.tree, descriptor);
        const stubs = catalog.countBy('stub');
        this.logger.debug(
            `Resolved ${catalog.size} ${descriptor.label}` + (stubs > 0 ? ` (${stubs} unresolved references)` : ''),
        );
        return catalog;
    }
}
