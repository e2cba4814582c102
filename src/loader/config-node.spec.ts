// src/loader/config-node.spec.ts
import { describe, it, expect } from 'vitest';
import { createNode, entriesAt, findAll, findFirst, hasPath, membersAt, nameOf, textAt, withChildren } from './config-node.js';
import { parseNode } from '../test-utils/fixtures.js';

describe('ConfigNode', () => {
    describe('createNode', () => {
        it('should freeze the node, its attributes and its children', () => {
            const child = createNode('member', { text: 'a' });
            const node = createNode('entry', { attributes: { name: 'x' }, children: [child] });

            expect(Object.isFrozen(node)).toBe(true);
            expect(Object.isFrozen(node.attributes)).toBe(true);
            expect(Object.isFrozen(node.children)).toBe(true);
        });

        it('should omit empty text', () => {
            expect('text' in createNode('entry', { text: '' })).toBe(false);
            expect(createNode('entry', { text: 'value' }).text).toBe('value');
        });

        it('should copy attributes instead of sharing the caller object', () => {
            const attributes = { name: 'x' };
            const node = createNode('entry', { attributes });
            attributes.name = 'y';

            expect(node.attributes['name']).toBe('x');
        });
    });

    describe('nameOf', () => {
        it('should return the name attribute or undefined when missing or empty', () => {
            expect(nameOf(createNode('entry', { attributes: { name: 'web' } }))).toBe('web');
            expect(nameOf(createNode('entry'))).toBeUndefined();
            expect(nameOf(createNode('entry', { attributes: { name: '' } }))).toBeUndefined();
        });
    });

    describe('withChildren', () => {
        it('should keep tag, attributes and text and replace children', () => {
            const node = createNode('entry', { attributes: { name: 'x' }, text: 't', children: [createNode('a')] });
            const copy = withChildren(node, [createNode('b')]);

            expect(copy.tag).toBe('entry');
            expect(copy.attributes).toEqual({ name: 'x' });
            expect(copy.text).toBe('t');
            expect(copy.children.map(child => child.tag)).toEqual(['b']);
            expect(node.children.map(child => child.tag)).toEqual(['a']);
        });
    });

    describe('path queries', () => {
        const node = parseNode(`
            <entry name="grp">
                <static>
                    <member>a</member>
                    <member>b</member>
                </static>
                <nested>
                    <static>
                        <member>c</member>
                    </static>
                </nested>
                <ip>
                    <entry name="10.0.0.1/24"/>
                    <entry/>
                </ip>
                <description>group</description>
            </entry>`);

        it('should walk child steps for relative paths', () => {
            expect(findAll(node, 'static/member').map(member => member.text)).toEqual(['a', 'b']);
        });

        it('should match the first step at any depth for // paths', () => {
            expect(findAll(node, '//static/member').map(member => member.text)).toEqual(['a', 'b', 'c']);
            expect(findAll(node, './/static/member')).toHaveLength(3);
        });

        it('should not match the node itself with a // path', () => {
            expect(findAll(node, '//entry').map(entry => nameOf(entry))).toEqual(['10.0.0.1/24', undefined]);
        });

        it('should treat * as any tag and . as the node itself', () => {
            expect(findAll(node, '*').map(child => child.tag)).toEqual(['static', 'nested', 'ip', 'description']);
            expect(findAll(node, '.')).toEqual([node]);
        });

        it('should read text and presence', () => {
            expect(textAt(node, 'description')).toBe('group');
            expect(textAt(node, 'missing')).toBeUndefined();
            expect(hasPath(node, 'nested/static')).toBe(true);
            expect(hasPath(node, 'dynamic')).toBe(false);
            expect(findFirst(node, '//member')?.text).toBe('a');
        });

        it('should collect member texts at any depth', () => {
            expect(membersAt(node, 'static')).toEqual(['a', 'b', 'c']);
        });

        it('should return only named entries', () => {
            expect(entriesAt(node, 'ip').map(entry => nameOf(entry))).toEqual(['10.0.0.1/24']);
        });
    });
});
