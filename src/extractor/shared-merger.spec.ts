// src/extractor/shared-merger.spec.ts
import { describe, it, expect } from 'vitest';
import { mergeChildren, mergeSharedSections } from './shared-merger.js';
import { nameOf, textAt } from '../loader/config-node.js';
import { parseNode } from '../test-utils/fixtures.js';

describe('mergeSharedSections', () => {
    it('should keep entries from disjoint sections exactly once', () => {
        const merged = mergeSharedSections([
            parseNode('<shared><address><entry name="A1"><fqdn>a1.example.test</fqdn></entry></address></shared>'),
            parseNode('<shared><address><entry name="A2"><fqdn>a2.example.test</fqdn></entry></address></shared>'),
        ]);

        expect(merged.tag).toBe('shared');
        expect(merged.children.map(child => child.tag)).toEqual(['address']);
        expect(merged.children[0]?.children.map(entry => nameOf(entry))).toEqual(['A1', 'A2']);
    });

    it('should keep the first definition of a duplicated entry', () => {
        const merged = mergeSharedSections([
            parseNode('<shared><address><entry name="A1"><ip-netmask>10.0.0.1/32</ip-netmask></entry></address></shared>'),
            parseNode('<shared><address><entry name="A1"><ip-netmask>10.0.0.2/32</ip-netmask></entry></address></shared>'),
        ]);

        const entries = merged.children[0]?.children ?? [];
        expect(entries).toHaveLength(1);
        expect(entries[0] && textAt(entries[0], 'ip-netmask')).toBe('10.0.0.1/32');
    });

    it('should append categories that only later sections have', () => {
        const merged = mergeSharedSections([
            parseNode('<shared><address><entry name="A1"/></address></shared>'),
            parseNode('<shared><tag><entry name="prod"/></tag><address><entry name="A2"/></address></shared>'),
        ]);

        expect(merged.children.map(child => child.tag)).toEqual(['address', 'tag']);
        expect(merged.children[0]?.children.map(entry => nameOf(entry))).toEqual(['A1', 'A2']);
    });

    it('should merge nested unnamed containers', () => {
        const merged = mergeSharedSections([
            parseNode('<shared><profiles><virus><entry name="av-1"/></virus></profiles></shared>'),
            parseNode('<shared><profiles><virus><entry name="av-2"/></virus><spyware><entry name="as-1"/></spyware></profiles></shared>'),
        ]);

        const profiles = merged.children[0];
        expect(profiles?.children.map(child => child.tag)).toEqual(['virus', 'spyware']);
        expect(profiles?.children[0]?.children.map(entry => nameOf(entry))).toEqual(['av-1', 'av-2']);
    });

    it('should produce an empty shared node for no sections', () => {
        const merged = mergeSharedSections([]);

        expect(merged.tag).toBe('shared');
        expect(merged.children).toEqual([]);
    });
});

describe('mergeChildren', () => {
    it('should treat the same name under different tags as different entries', () => {
        const existing = parseNode('<a><entry name="x"/></a>').children;
        const incoming = parseNode('<a><member name="x"/></a>').children;

        expect(mergeChildren(existing, incoming).map(child => child.tag)).toEqual(['entry', 'member']);
    });
});
