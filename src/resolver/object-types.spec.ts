// src/resolver/object-types.spec.ts
import { describe, it, expect } from 'vitest';
import { OBJECT_TYPES, PRE_SHARED_KEY_PLACEHOLDER, descriptorFor, isObjectType } from './object-types.js';
import { extractFields } from './field-extractors.js';
import { ObjectType } from './types.js';
import { parseNode } from '../test-utils/fixtures.js';

function fieldsOf(type: ObjectType, xml: string) {
    const descriptor = descriptorFor(type);
    if (!descriptor) {
        throw new Error(`missing descriptor ${type}`);
    }
    return extractFields(parseNode(xml), descriptor.fields);
}

describe('OBJECT_TYPES', () => {
    it('should register every object type exactly once', () => {
        const types = OBJECT_TYPES.map(descriptor => descriptor.type);

        expect(types).toHaveLength(39);
        expect(new Set(types).size).toBe(39);
    });

    it('should give every descriptor at least one scope pattern', () => {
        for (const descriptor of OBJECT_TYPES) {
            expect(descriptor.scopes.length).toBeGreaterThan(0);
        }
    });

    it('should search device groups before shared for addressable objects', () => {
        for (const type of ['address', 'address-group', 'service', 'service-group'] as const) {
            const descriptor = descriptorFor(type);
            expect(descriptor?.collision).toBe('last-full-wins');
            expect(descriptor?.scopes.map(pattern => pattern.scope)).toEqual(['device-group', 'shared', 'global']);
        }
    });

    it('should recognise registered type names', () => {
        expect(isObjectType('address')).toBe(true);
        expect(isObjectType('ipsec-crypto-profile')).toBe(true);
        expect(isObjectType('bogus')).toBe(false);
    });
});

describe('object fields', () => {
    it('should describe an address by its single addressing child', () => {
        expect(
            fieldsOf(
                'address',
                '<entry name="r"><ip-range>10.0.0.1-10.0.0.9</ip-range><tag><member>lab</member></tag></entry>',
            ),
        ).toEqual({ type: 'ip-range', value: '10.0.0.1-10.0.0.9', description: null, tags: ['lab'] });
    });

    it('should describe a service by protocol and port', () => {
        expect(
            fieldsOf(
                'service',
                '<entry name="s"><protocol><udp><port>53</port><source-port>1024-65535</source-port></udp></protocol></entry>',
            ),
        ).toEqual({ protocol: 'udp', port: '53', sourcePort: '1024-65535', description: null, tags: [] });
    });

    it('should describe static and dynamic address groups', () => {
        expect(fieldsOf('address-group', '<entry name="g"><dynamic><filter>\'web\'</filter></dynamic></entry>')).toEqual({
            staticMembers: [],
            dynamicFilter: "'web'",
            description: null,
            tags: [],
        });
    });

    it('should never expose a pre-shared key', () => {
        const fields = fieldsOf(
            'ike-gateway',
            `<entry name="gw">
                <authentication><pre-shared-key><key>test-secret</key></pre-shared-key></authentication>
                <protocol><ikev2><ike-crypto-profile>ike-p1</ike-crypto-profile></ikev2></protocol>
                <peer-address><ip>198.51.100.7</ip></peer-address>
                <local-address><interface>ethernet1/1</interface></local-address>
            </entry>`,
        );

        expect(fields['preSharedKey']).toBe(PRE_SHARED_KEY_PLACEHOLDER);
        expect(fields['authType']).toBe('pre-shared-key');
        expect(fields['version']).toBe('ikev2');
        expect(fields['ikeCryptoProfile']).toBe('ike-p1');
        expect(fields['peerAddress']).toBe('198.51.100.7');
        expect(fields['peerAddressType']).toBe('ip');
        expect(fields['localInterface']).toBe('ethernet1/1');
    });

    it('should default a zone without a network mode to layer3', () => {
        expect(fieldsOf('zone', '<entry name="z"/>')['mode']).toBe('layer3');
        expect(
            fieldsOf('zone', '<entry name="z"><network><layer2><member>ethernet1/4</member></layer2></network></entry>'),
        ).toMatchObject({ mode: 'layer2', interfaces: ['ethernet1/4'] });
    });

    it('should read proxy ids of an IPsec tunnel', () => {
        const fields = fieldsOf(
            'ipsec-tunnel',
            `<entry name="t1">
                <tunnel-interface>tunnel.1</tunnel-interface>
                <auto-key>
                    <ike-gateway><entry name="gw"/></ike-gateway>
                    <ipsec-crypto-profile>default</ipsec-crypto-profile>
                    <proxy-id><entry name="p1"><local>10.0.0.0/24</local><remote>10.1.0.0/24</remote></entry></proxy-id>
                </auto-key>
            </entry>`,
        );

        expect(fields).toEqual({
            tunnelInterface: 'tunnel.1',
            keyType: 'auto-key',
            ikeGateway: ['gw'],
            ipsecCryptoProfile: 'default',
            proxyIds: [{ name: 'p1', local: '10.0.0.0/24', remote: '10.1.0.0/24', protocol: null }],
            tunnelMonitor: false,
        });
    });
});
