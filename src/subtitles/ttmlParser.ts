import { XMLParser } from 'fast-xml-parser';
import { RawCue } from './types';

type XmlNode = Record<string, unknown>;

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  htmlEntities: true,
});

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tagName(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function childrenOf(node: XmlNode): XmlNode[] {
  const tag = tagName(node);
  const value = tag === undefined ? undefined : node[tag];
  return Array.isArray(value) ? value.filter(isXmlNode) : [];
}

function attribute(node: XmlNode, name: string): string | undefined {
  const attributes = node[ATTRIBUTES_KEY];
  if (!isXmlNode(attributes)) return undefined;
  const value = attributes[name];
  return typeof value === 'string' ? value : undefined;
}

function textOf(node: XmlNode): string | undefined {
  const value = node[TEXT_KEY];
  if (typeof value === 'string' || typeof value === 'number') {
    const text = String(value).trim();
    return text === '' ? undefined : text;
  }
  return undefined;
}

/**
 * Depth-first, document-order search for elements with the given local name
 */
function findAll(nodes: XmlNode[], name: string): XmlNode[] {
  const found: XmlNode[] = [];
  for (const node of nodes) {
    if (tagName(node) === name) {
      found.push(node);
    }
    found.push(...findAll(childrenOf(node), name));
  }
  return found;
}

interface CueContent {
  parts: string[];
  color: string;
}

function collectContent(nodes: XmlNode[], styles: Set<string>, content: CueContent): void {
  for (const node of nodes) {
    const tag = tagName(node);
    if (tag === TEXT_KEY) {
      const text = textOf(node);
      if (text !== undefined) content.parts.push(text);
    } else if (tag === 'span') {
      const style = attribute(node, 'style');
      if (style !== undefined && styles.has(style)) {
        content.color = style;
      }
      collectContent(childrenOf(node), styles, content);
    }
  }
}

/**
 * Parses a TTML (EBU-TT-D) subtitle document into cues
 * @param xml - The raw XML document
 * @returns One cue per `<p>` element, in document order
 */
export function parseTtml(xml: string): RawCue[] {
  const parsed: unknown = parser.parse(xml, true);
  const document = Array.isArray(parsed) ? parsed.filter(isXmlNode) : [];

  const styles = new Set<string>();
  for (const style of findAll(document, 'style')) {
    const id = attribute(style, 'id');
    if (id !== undefined) styles.add(id);
  }

  return findAll(document, 'p').map((paragraph, index) => {
    const start = attribute(paragraph, 'begin');
    const end = attribute(paragraph, 'end');
    if (start === undefined || end === undefined) {
      throw new Error(`Subtitle paragraph ${index + 1} has no begin/end timing`);
    }

    const paragraphStyle = attribute(paragraph, 'style');
    const content: CueContent = {
      parts: [],
      color: paragraphStyle !== undefined && styles.has(paragraphStyle) ? paragraphStyle : '',
    };
    collectContent(childrenOf(paragraph), styles, content);

    return { start, end, text: content.parts.join(' '), color: content.color };
  });
}
