// src/test-utils/fixtures.ts
import { fileURLToPath } from 'url';
import { vi } from 'vitest';
import winston from 'winston';
import { ConfigNode } from '../loader/config-node.js';
import { ConfigTree, parseConfigTree } from '../loader/tree-loader.js';

/** Small management-server export: shared objects, two device groups, two templates, one stack. */
export const SAMPLE_CONFIG_PATH = fileURLToPath(new URL('./fixtures/sample-panorama.xml', import.meta.url));

export function parseXml(xml: string): ConfigTree {
    return parseConfigTree(xml, '<test>');
}

/** Root node of an XML snippet. */
export function parseNode(xml: string): ConfigNode {
    return parseXml(xml).root;
}

export function createMockLogger(): winston.Logger {
    return {
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    } as unknown as winston.Logger;
}
