// src/loader/config-node.ts
/**
 * Immutable in-memory representation of the configuration document.
 */
export interface ConfigNode {
    readonly tag: string;
    readonly attributes: Readonly<Record<string, string>>;
    readonly children: readonly ConfigNode[];
    /** Trimmed text content, only set when non-empty. */
    readonly text?: string;
}

export interface NodeInit {
    attributes?: Record<string, string>;
    children?: readonly ConfigNode[];
    text?: string;
}

/**
 * Creates a frozen node. Children are expected to be frozen already
 * (every node built through this function is).
 */
export function createNode(tag: string, init: NodeInit = {}): ConfigNode {
    const node: ConfigNode = {
        tag,
        attributes: Object.freeze({ ...(init.attributes ?? {}) }),
        children: Object.freeze([...(init.children ?? [])]),
        ...(init.text !== undefined && init.text.length > 0 ? { text: init.text } : {}),
    };
    return Object.freeze(node);
}

/** The `name` identity attribute, if any. */
export function nameOf(node: ConfigNode): string | undefined {
    const name = node.attributes['name'];
    return name === undefined || name.length === 0 ? undefined : name;
}

export function withChildren(node: ConfigNode, children: readonly ConfigNode[]): ConfigNode {
    return createNode(node.tag, { attributes: { ...node.attributes }, children, text: node.text });
}

function matchesStep(node: ConfigNode, step: string): boolean {
    return step === '*' || node.tag === step;
}

function collectDescendants(node: ConfigNode, step: string, out: ConfigNode[]): void {
    for (const child of node.children) {
        if (matchesStep(child, step)) {
            out.push(child);
        }
        collectDescendants(child, step, out);
    }
}

/**
 * Resolves a relative path against a node.
 *
 * `a/b` walks children; a leading `//` (or `.//`) makes the first step match at any depth
 * below the node; `*` matches any tag. Results are in document order.
 */
export function findAll(node: ConfigNode, path: string): ConfigNode[] {
    const deep = path.startsWith('//') || path.startsWith('.//');
    const steps = path.replace(/^\.?\/\//, '').split('/').filter(step => step.length > 0 && step !== '.');
    if (steps.length === 0) {
        return [node];
    }

    const [first, ...rest] = steps;
    let current: ConfigNode[] = [];
    if (deep) {
        collectDescendants(node, first, current);
    } else {
        current = node.children.filter(child => matchesStep(child, first));
    }

    for (const step of rest) {
        current = current.flatMap(match => match.children.filter(child => matchesStep(child, step)));
    }
    return current;
}

export function findFirst(node: ConfigNode, path: string): ConfigNode | undefined {
    return findAll(node, path)[0];
}

export function hasPath(node: ConfigNode, path: string): boolean {
    return findFirst(node, path) !== undefined;
}

export function textAt(node: ConfigNode, path: string): string | undefined {
    return findFirst(node, path)?.text;
}

/**
 * Text of every `member` element under `path`, searched at any depth.
 */
export function membersAt(node: ConfigNode, path: string): string[] {
    return findAll(node, `//${path}/member`)
        .map(member => member.text)
        .filter((text): text is string => text !== undefined);
}

/** Named `entry` children under `path`. */
export function entriesAt(node: ConfigNode, path: string): ConfigNode[] {
    return findAll(node, `${path}/entry`).filter(entry => nameOf(entry) !== undefined);
}
