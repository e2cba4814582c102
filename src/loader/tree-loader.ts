// src/loader/tree-loader.ts
import fs from 'fs/promises';
import path from 'path';
import { DOMParser } from '@xmldom/xmldom';
import xpath from 'xpath';
import { createContextLogger } from '../utils/logger.js';
import { FileSystemError, ParseError, errorMessage } from '../utils/errors.js';
import { ConfigNode, createNode, nameOf } from './config-node.js';

const logger = createContextLogger('TreeLoader');

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

function isElement(node: Node): node is Element {
    return node.nodeType === ELEMENT_NODE;
}

/**
 * A loaded configuration document.
 *
 * The DOM is kept next to the immutable node graph so scope patterns can be
 * evaluated as XPath expressions; callers only ever see ConfigNodes.
 */
export class ConfigTree {
    private readonly nodeByElement: Map<Element, ConfigNode>;
    private readonly elementByNode: Map<ConfigNode, Element>;
    private readonly parents: Map<ConfigNode, ConfigNode>;

    constructor(
        public readonly root: ConfigNode,
        private readonly document: Document,
        index: {
            nodeByElement: Map<Element, ConfigNode>;
            elementByNode: Map<ConfigNode, Element>;
            parents: Map<ConfigNode, ConfigNode>;
        },
        public readonly source: string,
    ) {
        this.nodeByElement = index.nodeByElement;
        this.elementByNode = index.elementByNode;
        this.parents = index.parents;
    }

    /**
     * Evaluates an XPath expression against the document, or against `context`
     * when given. Non-element results are dropped.
     */
    select(expression: string, context?: ConfigNode): ConfigNode[] {
        const contextNode = context === undefined ? this.document : this.elementByNode.get(context);
        if (contextNode === undefined) {
            return [];
        }

        const result = xpath.select(expression, contextNode);
        if (!Array.isArray(result)) {
            return [];
        }

        const nodes: ConfigNode[] = [];
        for (const match of result) {
            if (!isElement(match)) {
                continue;
            }
            const node = this.nodeByElement.get(match);
            if (node !== undefined) {
                nodes.push(node);
            }
        }
        return nodes;
    }

    parentOf(node: ConfigNode): ConfigNode | undefined {
        return this.parents.get(node);
    }

    /** Ancestors from the immediate parent up to the root. */
    ancestors(node: ConfigNode): ConfigNode[] {
        const chain: ConfigNode[] = [];
        let current = this.parents.get(node);
        while (current !== undefined) {
            chain.push(current);
            current = this.parents.get(current);
        }
        return chain;
    }

    /**
     * Name of the closest enclosing `<container>/entry[@name]`, e.g. the
     * device group or template that owns a node.
     */
    enclosingEntryName(node: ConfigNode, container: string): string | undefined {
        let child = node;
        for (const ancestor of this.ancestors(node)) {
            if (ancestor.tag === container && child.tag === 'entry') {
                return nameOf(child);
            }
            child = ancestor;
        }
        return undefined;
    }
}

function convert(
    element: Element,
    index: {
        nodeByElement: Map<Element, ConfigNode>;
        elementByNode: Map<ConfigNode, Element>;
        parents: Map<ConfigNode, ConfigNode>;
    },
): ConfigNode {
    const attributes: Record<string, string> = {};
    for (let i = 0; i < element.attributes.length; i++) {
        const attribute = element.attributes.item(i);
        if (attribute) {
            attributes[attribute.name] = attribute.value;
        }
    }

    const children: ConfigNode[] = [];
    let text = '';
    for (let i = 0; i < element.childNodes.length; i++) {
        const child = element.childNodes.item(i);
        if (isElement(child)) {
            children.push(convert(child, index));
        } else if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
            text += child.nodeValue ?? '';
        }
    }

    const node = createNode(element.tagName, { attributes, children, text: text.trim() });
    index.nodeByElement.set(element, node);
    index.elementByNode.set(node, element);
    for (const child of children) {
        index.parents.set(child, node);
    }
    return node;
}

const MARKUP =
    /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>|<\/\s*([^\s>]+)\s*>|<([^\s/>!?]+)(?:[^>"']|"[^"]*"|'[^']*')*?(\/?)>/g;

/**
 * Checks that every start tag is closed by a matching end tag. The DOM parser
 * silently recovers from mismatched and unclosed tags, so this runs on the raw text.
 * Returns a description of the first problem, or undefined.
 */
export function findUnbalancedTag(content: string): string | undefined {
    const open: string[] = [];
    for (const match of content.matchAll(MARKUP)) {
        const [, endTag, startTag, selfClosing] = match;
        if (startTag !== undefined) {
            if (selfClosing !== '/') {
                open.push(startTag);
            }
        } else if (endTag !== undefined) {
            const expected = open.pop();
            if (expected !== endTag) {
                return expected === undefined
                    ? `end tag </${endTag}> has no matching start tag`
                    : `end tag </${endTag}> does not match <${expected}>`;
            }
        }
    }
    const unclosed = open.pop();
    return unclosed === undefined ? undefined : `element <${unclosed}> is not closed`;
}

/**
 * Parses a configuration document. Throws ParseError on malformed input,
 * including anything the DOM parser only warns about.
 */
export function parseConfigTree(content: string, source = '<memory>'): ConfigTree {
    const problems: string[] = [];
    const parser = new DOMParser({
        errorHandler: {
            warning: (message: string) => problems.push(message),
            error: (message: string) => problems.push(message),
            fatalError: (message: string) => problems.push(message),
        },
    });

    let document: Document;
    try {
        document = parser.parseFromString(content, 'text/xml');
    } catch (error: unknown) {
        throw new ParseError(`Failed to parse XML document ${source}: ${errorMessage(error)}`, {
            originalError: error,
            source,
        });
    }

    if (problems.length > 0) {
        throw new ParseError(`Failed to parse XML document ${source}: ${problems[0]}`, { source, problems });
    }

    const unbalanced = findUnbalancedTag(content);
    if (unbalanced !== undefined) {
        throw new ParseError(`Failed to parse XML document ${source}: ${unbalanced}`, { source });
    }

    const parserError = document.getElementsByTagName('parsererror')[0];
    if (parserError) {
        throw new ParseError(`XML parsing error in ${source}: ${parserError.textContent ?? ''}`, { source });
    }

    const rootElement = document.documentElement;
    if (!rootElement) {
        throw new ParseError(`No root element found in ${source}`, { source });
    }

    const index = {
        nodeByElement: new Map<Element, ConfigNode>(),
        elementByNode: new Map<ConfigNode, Element>(),
        parents: new Map<ConfigNode, ConfigNode>(),
    };
    const root = convert(rootElement, index);
    logger.debug(`Loaded ${index.elementByNode.size} elements from ${source}`);

    return new ConfigTree(root, document, index, source);
}

/**
 * Reads and parses a configuration document from disk.
 */
export async function loadConfigTree(filePath: string): Promise<ConfigTree> {
    const absolutePath = path.resolve(filePath);
    logger.info(`Loading configuration from ${absolutePath}`);

    let content: string;
    try {
        content = await fs.readFile(absolutePath, 'utf-8');
    } catch (error: unknown) {
        throw new FileSystemError(`Cannot read input file ${absolutePath}: ${errorMessage(error)}`, {
            originalError: error,
        });
    }

    return parseConfigTree(content, absolutePath);
}
