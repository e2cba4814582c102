// src/resolver/field-extractors.ts
import {
    ConfigNode,
    entriesAt,
    findAll,
    findFirst,
    hasPath,
    membersAt,
    nameOf,
    textAt,
} from '../loader/config-node.js';
import { FieldExtractor, FieldExtractors, FieldMap, FieldValue, StubPredicate } from './types.js';

/** Text of the first node at `path`, or null. */
export const text =
    (path: string): FieldExtractor =>
    node =>
        textAt(node, path) ?? null;

/** `member` texts under `path` at any depth. */
export const members =
    (path: string): FieldExtractor =>
    node =>
        membersAt(node, path);

/** True when the text at `path` is `yes`. */
export const flag =
    (path: string): FieldExtractor =>
    node =>
        textAt(node, path) === 'yes';

export const present =
    (path: string): FieldExtractor =>
    node =>
        hasPath(node, path);

export const attr =
    (name: string): FieldExtractor =>
    node =>
        node.attributes[name] ?? null;

/**
 * Tag of the first child of `path` that is one of `options` (in option order), or `fallback`.
 */
export const oneOf =
    (path: string, options: readonly string[], fallback: string | null = null): FieldExtractor =>
    node => {
        const container = path === '.' ? node : findFirst(node, path);
        if (container === undefined) {
            return fallback;
        }
        return options.find(option => container.children.some(child => child.tag === option)) ?? fallback;
    };

/** Names of the `entry` children under `path`. */
export const entryNames =
    (path: string): FieldExtractor =>
    node =>
        entriesAt(node, path).map(entry => nameOf(entry) ?? '');

/**
 * Named entries under `path` (at any depth when the path starts with `//`),
 * each extracted with `fields` and keyed by `name`.
 */
export const entries =
    (path: string, fields: FieldExtractors): FieldExtractor =>
    node =>
        findAll(node, `${path}/entry`)
            .filter(entry => nameOf(entry) !== undefined)
            .map(entry => ({ name: nameOf(entry) ?? '', ...extractFields(entry, fields) }));

/** First extractor result that is neither null nor an empty list. */
export const firstOf =
    (...extractors: FieldExtractor[]): FieldExtractor =>
    node => {
        for (const extract of extractors) {
            const value = extract(node);
            if (value !== null && !(Array.isArray(value) && value.length === 0)) {
                return value;
            }
        }
        return null;
    };

export const constant =
    (value: FieldValue): FieldExtractor =>
    () =>
        value;

export function extractFields(node: ConfigNode, fields: FieldExtractors): FieldMap {
    const result: Record<string, FieldValue> = {};
    for (const [field, extract] of Object.entries(fields)) {
        result[field] = extract(node);
    }
    return result;
}

/**
 * Stub predicate for reference entries: the node carries none of the given content paths.
 */
export function referenceUnless(...contentPaths: string[]): StubPredicate {
    return node => !contentPaths.some(path => hasPath(node, path));
}

/** For object types that have no reference-only form. */
export const neverStub: StubPredicate = () => false;
