/**
 * Small typed XML element tree, serialized with fast-xml-parser's builder.
 * Package documents, the NCX and container.xml are built as trees first and
 * written once.
 */

import { XMLBuilder } from 'fast-xml-parser';

export const XML_DECLARATION = "<?xml version='1.0' encoding='utf-8'?>";

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  text?: string;
  children: XmlElement[];
}

export function element(
  name: string,
  attributes: Record<string, string> = {},
  content?: string | XmlElement[]
): XmlElement {
  if (typeof content === 'string') {
    return { name, attributes, text: content, children: [] };
  }
  return { name, attributes, children: content ?? [] };
}

/**
 * Append a child and return it, for building nested trees in order
 */
export function appendChild(parent: XmlElement, child: XmlElement): XmlElement {
  parent.children.push(child);
  return child;
}

export function findChild(parent: XmlElement, name: string): XmlElement | undefined {
  return parent.children.find((child) => child.name === name);
}

// fast-xml-parser's ordered form: [{ tag: [...children], ':@': { '@_attr': value } }]
type OrderedNode = Record<string, OrderedNode[] | Record<string, string> | string>;

function toOrdered(node: XmlElement): OrderedNode {
  const content: OrderedNode[] = [];
  if (node.text !== undefined && node.text !== '') {
    content.push({ '#text': node.text });
  }
  content.push(...node.children.map(toOrdered));

  const ordered: OrderedNode = { [node.name]: content };
  const attributeEntries = Object.entries(node.attributes);
  if (attributeEntries.length > 0) {
    ordered[':@'] = Object.fromEntries(attributeEntries.map(([key, value]) => [`@_${key}`, value]));
  }
  return ordered;
}

export function serializeXml(root: XmlElement, options: { declaration?: boolean } = {}): string {
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    textNodeName: '#text',
    suppressEmptyNode: true,
    processEntities: true,
    format: false,
  });
  const body: string = builder.build([toOrdered(root)]);
  return options.declaration === false ? body : `${XML_DECLARATION}\n${body}`;
}
