// src/lib.ts
export type { ConfigNode, NodeInit } from './loader/config-node.js';
export { createNode, nameOf, findAll, findFirst, hasPath, textAt, membersAt, entriesAt } from './loader/config-node.js';
export { ConfigTree, parseConfigTree, loadConfigTree } from './loader/tree-loader.js';
export { serializeConfigNode } from './loader/xml-serializer.js';
export type * from './resolver/types.js';
export { OBJECT_TYPES, PRE_SHARED_KEY_PLACEHOLDER, descriptorFor, isObjectType } from './resolver/object-types.js';
export type { CatalogSet } from './resolver/scope-resolver.js';
export { Catalog, ScopeResolver, locate, resolve } from './resolver/scope-resolver.js';
export type {
    RouterDescriptor,
    RouterKind,
    StaticRoute,
    BgpPeer,
    BgpSummary,
    OspfArea,
    OspfSummary,
    RoutingProtocols,
} from './resolver/router-aggregator.js';
export {
    DEVICE_SPECIFIC,
    RouterAggregator,
    resolveRouters,
    routerSignature,
    sameRouterIdentity,
} from './resolver/router-aggregator.js';
export type { DeviceGroupBundle, ExtractionResult, ExtractorOptions } from './extractor/device-group-extractor.js';
export { DeviceGroupExtractor, extract, stripGroupPrefix } from './extractor/device-group-extractor.js';
export { mergeSharedSections } from './extractor/shared-merger.js';
export { sanitizeFileName, writeBundle } from './output/bundle-writer.js';
export type { CatalogCount, ResolutionSummary } from './output/catalog-writer.js';
export { formatSummary, summarize, writeCatalogs } from './output/catalog-writer.js';
export { AppError, ConfigError, FileSystemError, ParseError } from './utils/errors.js';
export type { AppConfig } from './config/index.js';
export { loadConfig } from './config/index.js';
