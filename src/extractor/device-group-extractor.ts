// src/extractor/device-group-extractor.ts
import winston from 'winston';
import { ConfigNode, createNode, findAll, nameOf } from '../loader/config-node.js';
import { ConfigTree } from '../loader/tree-loader.js';
import { createContextLogger } from '../utils/logger.js';
import config from '../config/index.js';
import { mergeSharedSections } from './shared-merger.js';

export interface DeviceGroupBundle {
    readonly groupName: string;
    /** The group's own `device-group/entry` subtree. */
    readonly deviceGroup: ConfigNode;
    /** Every shared section of the source, merged. */
    readonly shared: ConfigNode;
    readonly sharedSectionCount: number;
    readonly template?: ConfigNode;
    readonly templateStack?: ConfigNode;
    /** Synthetic `config` root holding all of the above. */
    readonly document: ConfigNode;
}

export type ExtractionResult =
    | { status: 'found'; groupName: string; bundle: DeviceGroupBundle }
    | { status: 'not-found'; groupName: string };

export interface ExtractorOptions {
    /** Prefixes removed from the front of a group name for the exact template lookup. */
    templatePrefixes?: readonly string[];
    /** Device entry name the bundle is placed under. */
    deviceName?: string;
    /** `version` used when the source root has none. */
    defaultVersion?: string;
}

/**
 * Removes the first matching naming-convention prefix from the front of a group name.
 */
export function stripGroupPrefix(groupName: string, prefixes: readonly string[]): string {
    const prefix = prefixes.find(candidate => candidate.length > 0 && groupName.startsWith(candidate));
    return prefix === undefined ? groupName : groupName.slice(prefix.length);
}

/**
 * Splits a configuration export into self-contained per-device-group documents.
 */
export class DeviceGroupExtractor {
    private readonly logger: winston.Logger;
    private readonly templatePrefixes: readonly string[];
    private readonly deviceName: string;
    private readonly defaultVersion: string;

    constructor(
        private readonly tree: ConfigTree,
        options: ExtractorOptions = {},
        logger?: winston.Logger,
    ) {
        this.logger = logger ?? createContextLogger('DeviceGroupExtractor');
        this.templatePrefixes = options.templatePrefixes ?? config.templatePrefixes;
        this.deviceName = options.deviceName ?? config.bundleDeviceName;
        this.defaultVersion = options.defaultVersion ?? config.defaultConfigVersion;
    }

    /** Distinct device-group names in document order. */
    listDeviceGroups(): string[] {
        const names = new Set<string>();
        for (const entry of this.tree.select('//device-group/entry')) {
            const name = nameOf(entry);
            if (name !== undefined) {
                names.add(name);
            }
        }
        return [...names];
    }

    extract(groupName: string): ExtractionResult {
        const deviceGroup = this.findDeviceGroup(groupName);
        if (deviceGroup === undefined) {
            this.logger.warn(`Device group not found: ${groupName}`);
            return { status: 'not-found', groupName };
        }

        const sections = this.tree.select('//shared');
        const shared = mergeSharedSections(sections);
        const template = this.findTemplate(groupName);
        const templateStack = this.findTemplateStack(groupName);

        if (template === undefined) {
            this.logger.debug(`No template associated with ${groupName}`);
        }
        if (templateStack === undefined) {
            this.logger.debug(`No template stack references ${groupName}`);
        }

        const bundle: DeviceGroupBundle = {
            groupName,
            deviceGroup,
            shared,
            sharedSectionCount: sections.length,
            ...(template ? { template } : {}),
            ...(templateStack ? { templateStack } : {}),
            document: this.assemble(deviceGroup, shared, sections.length > 0, template, templateStack),
        };
        return { status: 'found', groupName, bundle: Object.freeze(bundle) };
    }

    /**
     * Extracts every requested group (all groups when `groupNames` is omitted).
     * A missing group is reported in its result and does not stop the batch.
     */
    extractAll(groupNames?: readonly string[]): ExtractionResult[] {
        const targets = groupNames ?? this.listDeviceGroups();
        return targets.map(name => this.extract(name));
    }

    private findDeviceGroup(groupName: string): ConfigNode | undefined {
        return this.tree.select('//device-group/entry').find(entry => nameOf(entry) === groupName);
    }

    /**
     * Exact name match after prefix stripping, else the first template (document order)
     * whose name contains the group name, case-insensitively.
     */
    private findTemplate(groupName: string): ConfigNode | undefined {
        const templates = this.tree.select('//template/entry');
        const exactName = stripGroupPrefix(groupName, this.templatePrefixes);
        const exact = templates.find(entry => nameOf(entry) === exactName);
        if (exact) {
            return exact;
        }

        const needle = groupName.toLowerCase();
        return templates.find(entry => (nameOf(entry) ?? '').toLowerCase().includes(needle));
    }

    private findTemplateStack(groupName: string): ConfigNode | undefined {
        return this.tree
            .select('//template-stack/entry')
            .find(stack => findAll(stack, '//devices/entry').some(member => nameOf(member) === groupName));
    }

    private assemble(
        deviceGroup: ConfigNode,
        shared: ConfigNode,
        includeShared: boolean,
        template: ConfigNode | undefined,
        templateStack: ConfigNode | undefined,
    ): ConfigNode {
        const deviceChildren: ConfigNode[] = [createNode('device-group', { children: [deviceGroup] })];
        if (template) {
            deviceChildren.push(createNode('template', { children: [template] }));
        }
        if (templateStack) {
            deviceChildren.push(createNode('template-stack', { children: [templateStack] }));
        }

        const devices = createNode('devices', {
            children: [createNode('entry', { attributes: { name: this.deviceName }, children: deviceChildren })],
        });

        return createNode('config', {
            attributes: { version: this.tree.root.attributes['version'] ?? this.defaultVersion },
            children: includeShared ? [devices, shared] : [devices],
        });
    }
}

/**
 * Convenience wrapper around DeviceGroupExtractor.
 */
export function extract(tree: ConfigTree, groupName: string, options: ExtractorOptions = {}): ExtractionResult {
    return new DeviceGroupExtractor(tree, options).extract(groupName);
}
