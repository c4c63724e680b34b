import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { AttributeNode } from './attribute-node.js';
import { XmlParseError } from '../errors.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

// preserveOrder keeps sibling order; every element becomes
// `{ [tag]: children[], ':@'?: attributes }`.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  allowBooleanAttributes: true,
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(entries: unknown): AttributeNode[] {
  if (!Array.isArray(entries)) return [];
  const list: unknown[] = entries;
  const nodes: AttributeNode[] = [];
  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const tag = Object.keys(entry).find((k) => k !== ATTRIBUTES_KEY && k !== TEXT_KEY);
    if (tag === undefined) continue;

    const attributes: Record<string, string> = {};
    const rawAttributes = entry[ATTRIBUTES_KEY];
    if (isRecord(rawAttributes)) {
      for (const [name, value] of Object.entries(rawAttributes)) {
        attributes[name] = String(value);
      }
    }
    nodes.push(new AttributeNode(tag, attributes, toNodes(entry[tag])));
  }
  return nodes;
}

/**
 * Parses an XML document into its root AttributeNode. Text content,
 * comments and the XML declaration are dropped.
 */
export function parseXml(xml: string): AttributeNode {
  const validation = XMLValidator.validate(xml, { allowBooleanAttributes: true });
  if (validation !== true) {
    throw new XmlParseError(`Invalid XML: ${validation.err.msg}`, validation.err.line);
  }
  const root = toNodes(parser.parse(xml))[0];
  if (root === undefined) {
    throw new XmlParseError('Invalid XML: no root element');
  }
  return root;
}
