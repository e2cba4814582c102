// src/loader/xml-serializer.ts
import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import { ConfigNode } from './config-node.js';

const INDENT = '  ';

function appendNode(document: Document, parent: Node, node: ConfigNode, depth: number): void {
    const element = document.createElement(node.tag);
    for (const [name, value] of Object.entries(node.attributes)) {
        element.setAttribute(name, value);
    }

    if (node.text !== undefined) {
        element.appendChild(document.createTextNode(node.text));
    }
    if (node.children.length > 0) {
        for (const child of node.children) {
            element.appendChild(document.createTextNode(`\n${INDENT.repeat(depth + 1)}`));
            appendNode(document, element, child, depth + 1);
        }
        element.appendChild(document.createTextNode(`\n${INDENT.repeat(depth)}`));
    }

    parent.appendChild(element);
}

/**
 * Serializes a node tree as an indented XML document with a declaration.
 */
export function serializeConfigNode(root: ConfigNode): string {
    const document = new DOMImplementation().createDocument(null, null, null);
    appendNode(document, document, root, 0);
    const body = new XMLSerializer().serializeToString(document);
    return `<?xml version="1.0" encoding="utf-8"?>\n${body}\n`;
}
