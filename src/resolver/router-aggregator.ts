// src/resolver/router-aggregator.ts
import winston from 'winston';
import { ConfigNode, entriesAt, findAll, findFirst, nameOf, textAt } from '../loader/config-node.js';
import { ConfigTree } from '../loader/tree-loader.js';
import { createContextLogger } from '../utils/logger.js';
import config from '../config/index.js';

export type RouterKind = 'legacy' | 'advanced';

/** Template value recorded for routers defined directly on a device. */
export const DEVICE_SPECIFIC = 'device-specific';

export interface StaticRoute {
    name: string;
    destination: string | null;
    nexthopIp: string | null;
    /** Next virtual/logical router for inter-router routes. */
    nexthopRouter: string | null;
    interface: string | null;
    metric: string | null;
}

export interface BgpPeer {
    name: string;
    peerAs: string | null;
    peerAddress: string | null;
    localInterface: string | null;
    localAddress: string | null;
    peerGroup: string;
    enabled: boolean;
}

export interface BgpSummary {
    routerId: string | null;
    localAs: string | null;
    peerGroups: string[];
    peers: BgpPeer[];
}

export interface OspfArea {
    areaId: string;
    type: 'normal' | 'stub' | 'nssa';
    interfaces: string[];
}

export interface OspfSummary {
    routerId: string | null;
    areas: OspfArea[];
}

export interface RoutingProtocols {
    bgp?: BgpSummary;
    ospf?: OspfSummary;
}

export interface RouterDescriptor {
    name: string;
    /** Originating template, or `device-specific`. */
    template: string;
    kind: RouterKind;
    interfaces: string[];
    staticRoutes: StaticRoute[];
    signature: string;
    protocols: RoutingProtocols;
}

interface RouterSource {
    kind: RouterKind;
    tag: 'virtual-router' | 'logical-router';
    nextHopRouterTag: 'next-vr' | 'next-lr';
}

const SOURCES: readonly RouterSource[] = [
    { kind: 'legacy', tag: 'virtual-router', nextHopRouterTag: 'next-vr' },
    { kind: 'advanced', tag: 'logical-router', nextHopRouterTag: 'next-lr' },
];

/** Interfaces that take part in an identity signature: the first `size`, sorted. */
export function signatureInterfaces(interfaces: readonly string[], size: number): string[] {
    return interfaces.slice(0, size).sort();
}

export function routerSignature(name: string, interfaces: readonly string[], size: number): string {
    return `${name}_${signatureInterfaces(interfaces, size).join(',')}`;
}

function isPrefix(shorter: readonly string[], longer: readonly string[]): boolean {
    return shorter.length <= longer.length && shorter.every((item, index) => longer[index] === item);
}

/**
 * Two definitions describe the same router when the names match and one
 * capped, sorted interface list is a prefix of the other.
 */
export function sameRouterIdentity(
    a: Pick<RouterDescriptor, 'name' | 'interfaces'>,
    b: Pick<RouterDescriptor, 'name' | 'interfaces'>,
    size: number,
): boolean {
    if (a.name !== b.name) {
        return false;
    }
    const left = signatureInterfaces(a.interfaces, size);
    const right = signatureInterfaces(b.interfaces, size);
    return isPrefix(left, right) || isPrefix(right, left);
}

function parseStaticRoutes(router: ConfigNode, nextHopRouterTag: string): StaticRoute[] {
    return findAll(router, '//routing-table/ip/static-route/entry').flatMap(route => {
        const name = nameOf(route);
        if (name === undefined) {
            return [];
        }
        return [
            {
                name,
                destination: textAt(route, 'destination') ?? null,
                nexthopIp: textAt(route, 'nexthop/ip-address') ?? null,
                nexthopRouter: textAt(route, `nexthop/${nextHopRouterTag}`) ?? null,
                interface: textAt(route, 'interface') ?? null,
                metric: textAt(route, 'metric') ?? null,
            },
        ];
    });
}

function parseBgp(router: ConfigNode): BgpSummary | undefined {
    const bgp = findFirst(router, '//bgp');
    if (bgp === undefined || textAt(bgp, 'enable') !== 'yes') {
        return undefined;
    }

    const peerGroups = entriesAt(bgp, 'peer-group');
    return {
        routerId: textAt(bgp, 'router-id') ?? null,
        localAs: textAt(bgp, 'local-as') ?? null,
        peerGroups: peerGroups.map(group => nameOf(group) ?? ''),
        peers: peerGroups.flatMap(group =>
            entriesAt(group, 'peer').map(peer => ({
                name: nameOf(peer) ?? '',
                peerAs: textAt(peer, 'peer-as') ?? null,
                peerAddress: textAt(peer, 'peer-address/ip') ?? null,
                localInterface: textAt(peer, 'local-address/interface') ?? null,
                localAddress: textAt(peer, 'local-address/ip') ?? null,
                peerGroup: nameOf(group) ?? '',
                enabled: textAt(peer, 'enable') !== 'no',
            })),
        ),
    };
}

function parseOspf(router: ConfigNode): OspfSummary | undefined {
    const ospf = findFirst(router, '//ospf');
    if (ospf === undefined || textAt(ospf, 'enable') !== 'yes') {
        return undefined;
    }

    return {
        routerId: textAt(ospf, 'router-id') ?? null,
        areas: entriesAt(ospf, 'area').map(area => ({
            areaId: nameOf(area) ?? '',
            type: findFirst(area, 'type/stub') ? 'stub' : findFirst(area, 'type/nssa') ? 'nssa' : 'normal',
            interfaces: entriesAt(area, 'interface').map(iface => nameOf(iface) ?? ''),
        })),
    };
}

/**
 * Collects virtual (legacy) and logical (advanced routing engine) routers
 * and collapses repeated definitions of the same router.
 */
export class RouterAggregator {
    private readonly logger: winston.Logger;

    constructor(
        private readonly tree: ConfigTree,
        private readonly signatureSize: number = config.routerSignatureSize,
        logger?: winston.Logger,
    ) {
        this.logger = logger ?? createContextLogger('RouterAggregator');
    }

    /**
     * Legacy routers first, then advanced ones. Within a kind, template
     * definitions are scanned before device-level ones.
     */
    resolveRouters(): RouterDescriptor[] {
        const routers = SOURCES.flatMap(source => this.aggregate(source));
        this.logger.debug(`Resolved ${routers.length} routers`);
        return routers;
    }

    private aggregate(source: RouterSource): RouterDescriptor[] {
        const retained: RouterDescriptor[] = [];

        const consider = (candidate: RouterDescriptor): void => {
            const index = retained.findIndex(existing => sameRouterIdentity(existing, candidate, this.signatureSize));
            if (index === -1) {
                retained.push(candidate);
                return;
            }
            const existing = retained[index];
            if (existing && candidate.interfaces.length > existing.interfaces.length) {
                this.logger.debug(
                    `Router ${candidate.name}: definition from ${candidate.template} (${candidate.interfaces.length} interfaces) ` +
                        `replaces the one from ${existing.template} (${existing.interfaces.length})`,
                );
                retained[index] = candidate;
            }
        };

        for (const template of this.tree.select('//template/entry')) {
            const templateName = nameOf(template);
            if (templateName === undefined) {
                continue;
            }
            for (const router of this.tree.select(`.//network/${source.tag}/entry`, template)) {
                const descriptor = this.describe(router, templateName, source);
                if (descriptor) {
                    consider(descriptor);
                }
            }
        }

        for (const router of this.tree.select(`//devices/entry/network/${source.tag}/entry`)) {
            const descriptor = this.describe(router, DEVICE_SPECIFIC, source);
            if (descriptor) {
                consider(descriptor);
            }
        }

        return retained;
    }

    private describe(router: ConfigNode, template: string, source: RouterSource): RouterDescriptor | undefined {
        const name = nameOf(router);
        if (name === undefined) {
            return undefined;
        }

        const interfaces = findAll(router, '//interface/member')
            .map(member => member.text)
            .filter((text): text is string => text !== undefined);

        const protocols: RoutingProtocols = {};
        const bgp = parseBgp(router);
        if (bgp) {
            protocols.bgp = bgp;
        }
        const ospf = parseOspf(router);
        if (ospf) {
            protocols.ospf = ospf;
        }

        return {
            name,
            template,
            kind: source.kind,
            interfaces,
            staticRoutes: parseStaticRoutes(router, source.nextHopRouterTag),
            signature: routerSignature(name, interfaces, this.signatureSize),
            protocols,
        };
    }
}

/**
 * Convenience wrapper around RouterAggregator.
 */
export function resolveRouters(tree: ConfigTree, signatureSize: number = config.routerSignatureSize): RouterDescriptor[] {
    return new RouterAggregator(tree, signatureSize).resolveRouters();
}
