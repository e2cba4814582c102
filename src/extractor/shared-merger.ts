// src/extractor/shared-merger.ts
import { ConfigNode, createNode, nameOf, withChildren } from '../loader/config-node.js';

function sameEntry(a: ConfigNode, b: ConfigNode): boolean {
    const name = nameOf(a);
    return name !== undefined && a.tag === b.tag && nameOf(b) === name;
}

/**
 * Merges `incoming` children into `existing` children.
 *
 * Named children are appended unless a child with the same (tag, name) is already
 * there; the first definition wins. Unnamed containers with a tag already present
 * are merged recursively; otherwise they are appended as they are.
 */
export function mergeChildren(existing: readonly ConfigNode[], incoming: readonly ConfigNode[]): ConfigNode[] {
    const merged = [...existing];

    for (const child of incoming) {
        if (nameOf(child) !== undefined) {
            if (!merged.some(candidate => sameEntry(candidate, child))) {
                merged.push(child);
            }
            continue;
        }

        const index = merged.findIndex(candidate => nameOf(candidate) === undefined && candidate.tag === child.tag);
        const target = merged[index];
        if (index === -1 || target === undefined) {
            merged.push(child);
            continue;
        }
        if (child.children.length > 0) {
            merged[index] = withChildren(target, mergeChildren(target.children, child.children));
        }
    }

    return merged;
}

/**
 * Folds every shared section into one synthetic `shared` node. Categories are
 * adopted from the first section that has them; later sections only contribute
 * entries whose names are not taken yet.
 */
export function mergeSharedSections(sections: readonly ConfigNode[]): ConfigNode {
    let children: ConfigNode[] = [];
    for (const section of sections) {
        children = mergeChildren(children, section.children);
    }
    return createNode('shared', { children });
}
