// src/loader/xml-serializer.spec.ts
import { describe, it, expect } from 'vitest';
import { serializeConfigNode } from './xml-serializer.js';
import { createNode } from './config-node.js';
import { parseConfigTree } from './tree-loader.js';

describe('serializeConfigNode', () => {
    const document = createNode('config', {
        attributes: { version: '10.0.0' },
        children: [
            createNode('devices', {
                children: [
                    createNode('entry', {
                        attributes: { name: 'fw' },
                        children: [createNode('description', { text: 'R&D lab' })],
                    }),
                ],
            }),
            createNode('shared'),
        ],
    });

    it('should write an indented document with an XML declaration', () => {
        expect(serializeConfigNode(document)).toBe(
            [
                '<?xml version="1.0" encoding="utf-8"?>',
                '<config version="10.0.0">',
                '  <devices>',
                '    <entry name="fw">',
                '      <description>R&amp;D lab</description>',
                '    </entry>',
                '  </devices>',
                '  <shared/>',
                '</config>',
                '',
            ].join('\n'),
        );
    });

    it('should produce output that parses back to the same tree', () => {
        const reparsed = parseConfigTree(serializeConfigNode(document));

        expect(reparsed.root).toEqual(document);
    });
});
