import { type AnyNode, type Document, type Element, isTag, isText } from 'domhandler';
import render from 'dom-serializer';
import { findAll } from 'domutils';
import { parseDocument } from 'htmlparser2';

const VOID_ELEMENTS = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'source',
  'track',
  'wbr',
]);
const XML_NAME = /^[A-Za-z_][\w.:-]*$/;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function parseFragment(html: string): Document {
  return parseDocument(html);
}

export function findImages(document: Document): Element[] {
  return findAll((element) => element.name === 'img', document.children);
}

export function toHtml(document: Document): string {
  return render(document, { encodeEntities: 'utf8' });
}

/** Serializes nodes as well-formed XHTML in UTF-8. Comments and directives are dropped. */
export function toXhtml(nodes: AnyNode[]): string {
  return nodes.map(serializeNode).join('');
}

function serializeNode(node: AnyNode): string {
  if (isText(node)) {
    return escapeXml(node.data);
  }
  if (!isTag(node)) {
    return '';
  }

  const attributes = Object.entries(node.attribs)
    .filter(([name]) => XML_NAME.test(name))
    .map(([name, value]) => ` ${name}="${escapeXml(value)}"`)
    .join('');

  if (VOID_ELEMENTS.has(node.name)) {
    return `<${node.name}${attributes}/>`;
  }
  return `<${node.name}${attributes}>${toXhtml(node.children)}</${node.name}>`;
}
