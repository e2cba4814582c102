// src/resolver/object-types.ts
import {
    attr,
    constant,
    entries,
    entryNames,
    firstOf,
    flag,
    members,
    neverStub,
    oneOf,
    present,
    referenceUnless,
    text,
} from './field-extractors.js';
import { FieldExtractors, ObjectType, ObjectTypeDescriptor, ScopePattern } from './types.js';

// --- Scope patterns -------------------------------------------------------

export const inDeviceGroups = (category: string): ScopePattern => ({
    scope: 'device-group',
    xpath: `//device-group/entry/${category}/entry`,
});

export const inShared = (category: string): ScopePattern => ({
    scope: 'shared',
    xpath: `//shared/${category}/entry`,
});

/** Any `<category>/entry` in the document, whatever scope encloses it. */
export const anywhere = (category: string): ScopePattern => ({
    scope: 'global',
    xpath: `//${category}/entry`,
});

const inRulebases = (ruleType: string): ScopePattern[] => [
    { scope: 'rulebase', xpath: `//${ruleType}/rules/entry` },
    { scope: 'device-group', xpath: `//device-group/entry/pre-rulebase/${ruleType}/rules/entry` },
    { scope: 'device-group', xpath: `//device-group/entry/post-rulebase/${ruleType}/rules/entry` },
];

const inNetwork = (path: string): ScopePattern[] => [
    { scope: 'global', xpath: `//network/${path}` },
    { scope: 'device', xpath: `//devices/entry/network/${path}` },
];

// --- Shared field sets ----------------------------------------------------

const RECURRING = ['five-minute', 'hourly', 'daily', 'weekly', 'monthly'];

const interfaceAddressing: FieldExtractors = {
    ipAddresses: entryNames('//ip'),
    ipv6Addresses: entryNames('//ipv6/address'),
    managementProfile: text('//interface-management-profile'),
    comment: text('comment'),
};

const describedProfile = (type: ObjectType, label: string, category: string): ObjectTypeDescriptor => ({
    type,
    label,
    scopes: [anywhere(`profiles/${category}`), inDeviceGroups(`profiles/${category}`), inShared(`profiles/${category}`)],
    isStub: neverStub,
    collision: 'first-wins',
    fields: { description: text('description') },
});

/** Written in place of every pre-shared key. */
export const PRE_SHARED_KEY_PLACEHOLDER = '***CHANGE_ME***';

// --- Descriptor table -----------------------------------------------------

export const OBJECT_TYPES: readonly ObjectTypeDescriptor[] = [
    {
        type: 'device-group',
        label: 'device groups',
        scopes: [anywhere('device-group')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { description: text('description') },
    },
    {
        type: 'tag',
        label: 'tags',
        scopes: [anywhere('tag'), inDeviceGroups('tag')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { color: text('color'), comments: text('comments') },
    },
    {
        type: 'region',
        label: 'regions',
        scopes: [anywhere('region'), inDeviceGroups('region')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { addresses: members('address') },
    },
    {
        type: 'custom-url-category',
        label: 'custom URL categories',
        scopes: [anywhere('custom-url-category'), inDeviceGroups('custom-url-category')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { type: text('type'), list: members('list'), description: text('description') },
    },
    {
        type: 'application-group',
        label: 'application groups',
        scopes: [anywhere('application-group'), inDeviceGroups('application-group')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { members: members('members') },
    },
    {
        type: 'application-filter',
        label: 'application filters',
        scopes: [anywhere('application-filter'), inDeviceGroups('application-filter')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            category: members('category'),
            subcategory: members('subcategory'),
            technology: members('technology'),
            risk: members('risk'),
            evasive: text('evasive'),
            excessiveBandwidthUse: text('excessive-bandwidth-use'),
            proneToMisuse: text('prone-to-misuse'),
            isSaas: text('is-saas'),
            transfersFiles: text('transfers-files'),
            tunnelsOtherApps: text('tunnels-other-apps'),
            usedByMalware: text('used-by-malware'),
        },
    },
    {
        type: 'external-list',
        label: 'external dynamic lists',
        scopes: [anywhere('external-list'), inDeviceGroups('external-list')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            type: oneOf('type', ['ip', 'domain', 'url']),
            url: firstOf(text('type/ip/url'), text('type/domain/url'), text('type/url/url')),
            recurring: firstOf(
                oneOf('type/ip/recurring', RECURRING),
                oneOf('type/domain/recurring', RECURRING),
                oneOf('type/url/recurring', RECURRING),
            ),
            description: text('description'),
        },
    },
    {
        type: 'schedule',
        label: 'schedules',
        scopes: [anywhere('schedule'), inDeviceGroups('schedule')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            scheduleType: oneOf('schedule-type', ['recurring', 'non-recurring']),
            recurring: entryNames('schedule-type/recurring'),
            nonRecurring: members('schedule-type/non-recurring'),
        },
    },
    {
        type: 'address',
        label: 'address objects',
        scopes: [inDeviceGroups('address'), inShared('address'), anywhere('address')],
        isStub: referenceUnless('ip-netmask', 'ip-range', 'ip-wildcard', 'fqdn', 'description'),
        collision: 'last-full-wins',
        fields: {
            type: oneOf('.', ['ip-netmask', 'ip-range', 'ip-wildcard', 'fqdn']),
            value: firstOf(text('ip-netmask'), text('ip-range'), text('ip-wildcard'), text('fqdn')),
            description: text('description'),
            tags: members('tag'),
        },
    },
    {
        type: 'address-group',
        label: 'address groups',
        scopes: [inDeviceGroups('address-group'), inShared('address-group'), anywhere('address-group')],
        isStub: referenceUnless('//static', '//dynamic', 'description'),
        collision: 'last-full-wins',
        fields: {
            staticMembers: members('static'),
            dynamicFilter: text('//dynamic/filter'),
            description: text('description'),
            tags: members('tag'),
        },
    },
    {
        type: 'service',
        label: 'service objects',
        scopes: [inDeviceGroups('service'), inShared('service'), anywhere('service')],
        isStub: referenceUnless('protocol', 'description'),
        collision: 'last-full-wins',
        fields: {
            protocol: oneOf('protocol', ['tcp', 'udp', 'sctp']),
            port: firstOf(text('protocol/tcp/port'), text('protocol/udp/port'), text('protocol/sctp/port')),
            sourcePort: firstOf(
                text('protocol/tcp/source-port'),
                text('protocol/udp/source-port'),
                text('protocol/sctp/source-port'),
            ),
            description: text('description'),
            tags: members('tag'),
        },
    },
    {
        type: 'service-group',
        label: 'service groups',
        scopes: [inDeviceGroups('service-group'), inShared('service-group'), anywhere('service-group')],
        isStub: referenceUnless('//members', 'description'),
        collision: 'last-full-wins',
        fields: { members: members('members'), description: text('description'), tags: members('tag') },
    },
    {
        type: 'security-rule',
        label: 'security rules',
        scopes: inRulebases('security'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            uuid: attr('uuid'),
            sourceZones: members('from'),
            sourceAddresses: members('source'),
            sourceUsers: members('source-user'),
            destinationZones: members('to'),
            destinationAddresses: members('destination'),
            applications: members('application'),
            services: members('service'),
            categories: members('category'),
            action: text('action'),
            profileGroup: text('profile-setting/group/member'),
            logSetting: text('log-setting'),
            logStart: flag('log-start'),
            logEnd: flag('log-end'),
            disabled: flag('disabled'),
            description: text('description'),
            tags: members('tag'),
        },
    },
    {
        type: 'nat-rule',
        label: 'NAT rules',
        scopes: inRulebases('nat'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            uuid: attr('uuid'),
            sourceZones: members('from'),
            destinationZones: members('to'),
            destinationInterface: text('to-interface'),
            sourceAddresses: members('source'),
            destinationAddresses: members('destination'),
            service: text('service'),
            sourceTranslationType: oneOf('source-translation', [
                'dynamic-ip-and-port',
                'dynamic-ip',
                'static-ip',
            ]),
            sourceTranslationAddresses: firstOf(
                members('source-translation/dynamic-ip-and-port/translated-address'),
                members('source-translation/dynamic-ip/translated-address'),
            ),
            sourceTranslationInterface: text('source-translation/dynamic-ip-and-port/interface-address/interface'),
            staticTranslatedAddress: text('source-translation/static-ip/translated-address'),
            destinationTranslationAddress: text('destination-translation/translated-address'),
            destinationTranslationPort: text('destination-translation/translated-port'),
            disabled: flag('disabled'),
            description: text('description'),
        },
    },
    {
        type: 'decryption-rule',
        label: 'decryption rules',
        scopes: inRulebases('decryption'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            uuid: attr('uuid'),
            sourceZones: members('from'),
            destinationZones: members('to'),
            sourceAddresses: members('source'),
            destinationAddresses: members('destination'),
            sourceUsers: members('source-user'),
            categories: members('category'),
            services: members('service'),
            action: text('action'),
            type: oneOf('type', ['ssl-forward-proxy', 'ssl-inbound-inspection', 'ssh-proxy']),
            profile: text('profile'),
            logSetting: text('log-setting'),
            disabled: flag('disabled'),
            description: text('description'),
        },
    },
    {
        type: 'pbf-rule',
        label: 'policy-based forwarding rules',
        scopes: inRulebases('pbf'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            uuid: attr('uuid'),
            sourceZones: members('from/zone'),
            sourceInterfaces: members('from/interface'),
            sourceAddresses: members('source'),
            sourceUsers: members('source-user'),
            destinationAddresses: members('destination'),
            applications: members('application'),
            services: members('service'),
            action: oneOf('action', ['forward', 'forward-to-vsys', 'discard', 'no-pbf']),
            egressInterface: text('action/forward/egress-interface'),
            nexthopIp: text('action/forward/nexthop/ip-address'),
            enforceSymmetricReturn: flag('enforce-symmetric-return/enabled'),
            disabled: flag('disabled'),
            description: text('description'),
        },
    },
    {
        type: 'application-override-rule',
        label: 'application override rules',
        scopes: inRulebases('application-override'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            sourceZones: members('from'),
            destinationZones: members('to'),
            sourceAddresses: members('source'),
            destinationAddresses: members('destination'),
            protocol: text('protocol'),
            port: text('port'),
            application: text('application'),
            disabled: flag('disabled'),
            description: text('description'),
        },
    },
    {
        type: 'zone',
        label: 'zones',
        scopes: [
            anywhere('zone'),
            { scope: 'vsys', xpath: '//vsys/entry/zone/entry' },
            { scope: 'device', xpath: '//devices/entry/vsys/entry/zone/entry' },
        ],
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            mode: oneOf('network', ['layer3', 'layer2', 'virtual-wire', 'tap', 'tunnel'], 'layer3'),
            interfaces: members('network/*'),
            zoneProtectionProfile: text('//zone-protection-profile'),
            logSetting: text('network/log-setting'),
            enableUserIdentification: flag('enable-user-identification'),
        },
    },
    {
        type: 'ethernet-interface',
        label: 'ethernet interfaces',
        scopes: inNetwork('interface/ethernet/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            mode: oneOf('.', ['layer3', 'layer2', 'virtual-wire', 'tap', 'ha', 'aggregate-group']),
            aggregateGroup: text('aggregate-group'),
            ...interfaceAddressing,
        },
    },
    {
        type: 'aggregate-interface',
        label: 'aggregate ethernet interfaces',
        scopes: inNetwork('interface/aggregate-ethernet/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            mode: oneOf('.', ['layer3', 'layer2', 'virtual-wire', 'ha']),
            ipAddresses: entryNames('layer3/ip'),
            managementProfile: text('layer3/interface-management-profile'),
            units: entryNames('layer3/units'),
            comment: text('comment'),
        },
    },
    {
        type: 'aggregate-subinterface',
        label: 'aggregate sub-interfaces',
        scopes: inNetwork('interface/aggregate-ethernet/entry/layer3/units/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: { tag: text('tag'), ...interfaceAddressing },
    },
    {
        type: 'vlan-interface',
        label: 'VLAN interfaces',
        scopes: inNetwork('interface/vlan/units/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: { tag: text('tag'), ...interfaceAddressing },
    },
    {
        type: 'loopback-interface',
        label: 'loopback interfaces',
        scopes: inNetwork('interface/loopback/units/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: { ...interfaceAddressing },
    },
    {
        type: 'tunnel-interface',
        label: 'tunnel interfaces',
        scopes: inNetwork('interface/tunnel/units/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: { ...interfaceAddressing },
    },
    describedProfile('antivirus-profile', 'antivirus profiles', 'virus'),
    describedProfile('vulnerability-profile', 'vulnerability profiles', 'vulnerability'),
    describedProfile('anti-spyware-profile', 'anti-spyware profiles', 'spyware'),
    describedProfile('url-filtering-profile', 'URL filtering profiles', 'url-filtering'),
    describedProfile('file-blocking-profile', 'file blocking profiles', 'file-blocking'),
    describedProfile('wildfire-analysis-profile', 'WildFire analysis profiles', 'wildfire-analysis'),
    {
        type: 'security-profile-group',
        label: 'security profile groups',
        scopes: [anywhere('profile-group'), inDeviceGroups('profile-group'), inShared('profile-group')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            virus: members('virus'),
            spyware: members('spyware'),
            vulnerability: members('vulnerability'),
            urlFiltering: members('url-filtering'),
            fileBlocking: members('file-blocking'),
            wildfireAnalysis: members('wildfire-analysis'),
        },
    },
    {
        type: 'zone-protection-profile',
        label: 'zone protection profiles',
        scopes: [
            anywhere('zone-protection-profile'),
            inDeviceGroups('zone-protection-profile'),
            { scope: 'global', xpath: '//network/profiles/zone-protection-profile/entry' },
        ],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { description: text('description') },
    },
    {
        type: 'log-forwarding-profile',
        label: 'log forwarding profiles',
        scopes: [anywhere('log-settings/profiles'), inDeviceGroups('log-settings/profiles'), inShared('log-settings/profiles')],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { description: text('description'), matchLists: entryNames('match-list') },
    },
    {
        type: 'qos-profile',
        label: 'QoS profiles',
        scopes: [anywhere('qos/profile'), inDeviceGroups('qos/profile'), { scope: 'global', xpath: '//network/qos/profile/entry' }],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { classes: entries('//class', { priority: text('priority') }) },
    },
    {
        type: 'tunnel-monitor-profile',
        label: 'tunnel monitor profiles',
        scopes: [
            { scope: 'global', xpath: '//network/tunnel/global-protect-gateway/Default/tunnel-monitor/monitor-profile/entry' },
            ...inNetwork('tunnel-monitor/monitor-profile/entry'),
        ],
        isStub: neverStub,
        collision: 'first-wins',
        fields: { interval: text('interval'), threshold: text('threshold'), action: text('action') },
    },
    {
        type: 'ike-gateway',
        label: 'IKE gateways',
        scopes: inNetwork('ike/gateway/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            version: oneOf('protocol', ['ikev2', 'ikev1'], 'ikev1'),
            ikeCryptoProfile: firstOf(
                text('protocol/ikev2/ike-crypto-profile'),
                text('protocol/ikev1/ike-crypto-profile'),
            ),
            peerAddress: firstOf(text('//peer-address/fqdn'), text('//peer-address/ip')),
            peerAddressType: oneOf('peer-address', ['fqdn', 'ip', 'dynamic']),
            localAddress: text('//local-address/ip'),
            localInterface: text('//local-address/interface'),
            authType: oneOf('authentication', ['pre-shared-key', 'certificate'], 'pre-shared-key'),
            preSharedKey: constant(PRE_SHARED_KEY_PLACEHOLDER),
            certificateProfile: text('authentication/certificate/profile'),
            localId: text('local-id/id'),
            peerId: text('peer-id/id'),
        },
    },
    {
        type: 'ipsec-tunnel',
        label: 'IPsec tunnels',
        scopes: inNetwork('tunnel/ipsec/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            tunnelInterface: text('tunnel-interface'),
            keyType: oneOf('.', ['manual-key', 'auto-key'], 'auto-key'),
            ikeGateway: firstOf(entryNames('auto-key/ike-gateway')),
            ipsecCryptoProfile: text('auto-key/ipsec-crypto-profile'),
            proxyIds: entries('auto-key/proxy-id', {
                local: text('local'),
                remote: text('remote'),
                protocol: text('protocol/number'),
            }),
            tunnelMonitor: present('tunnel-monitor'),
        },
    },
    {
        type: 'ike-crypto-profile',
        label: 'IKE crypto profiles',
        scopes: inNetwork('ike/crypto-profiles/ike-crypto-profiles/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            dhGroups: members('dh-group'),
            authentications: firstOf(members('hash'), members('authentication')),
            encryptions: members('encryption'),
            lifetimeHours: text('lifetime/hours'),
        },
    },
    {
        type: 'ipsec-crypto-profile',
        label: 'IPsec crypto profiles',
        scopes: inNetwork('ike/crypto-profiles/ipsec-crypto-profiles/entry'),
        isStub: neverStub,
        collision: 'first-wins',
        fields: {
            protocol: oneOf('.', ['ah', 'esp'], 'esp'),
            encryptions: members('esp/encryption'),
            authentications: firstOf(members('ah/authentication'), members('esp/authentication')),
            dhGroup: text('dh-group'),
            lifetimeHours: text('lifetime/hours'),
            lifetimeKilobytes: firstOf(text('lifesize/kb'), text('lifetime/kilobytes')),
        },
    },
];

export function descriptorFor(type: ObjectType): ObjectTypeDescriptor | undefined {
    return OBJECT_TYPES.find(descriptor => descriptor.type === type);
}

export function isObjectType(value: string): value is ObjectType {
    return OBJECT_TYPES.some(descriptor => descriptor.type === value);
}
