/**
 * Parser for the raw Code::Blocks project document
 *
 * Produces a generic element tree in document order. Nothing is interpreted
 * here; unknown elements and attributes are kept so newer project files still
 * load.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { StructuralParseError } from '../core/errors.js';

/**
 * Element of the raw project tree
 */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
}

/**
 * Parsed project document with the mandatory elements located
 */
export interface CbpDocument {
  root: XmlElement;
  project: XmlElement;
}

const ROOT_ELEMENT = 'CodeBlocks_project_file';

/** Key fast-xml-parser stores attributes under when preserving order */
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;

  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === 'string') {
      attributes[key] = raw;
    } else if (typeof raw === 'number' || typeof raw === 'boolean') {
      attributes[key] = String(raw);
    }
  }
  return attributes;
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
      elements.push({
        name: key,
        attributes: toAttributes(node[ATTRIBUTES_KEY]),
        children: toElements(value),
      });
    }
  }
  return elements;
}

/**
 * Parses XML text into an element tree
 *
 * @throws StructuralParseError when the text is not well-formed XML
 */
export function parseXml(content: string): XmlElement[] {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new StructuralParseError(`Malformed project document: ${msg}`, line, col);
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseAttributeValue: false,
    parseTagValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    trimValues: true,
  });

  const parsed: unknown = parser.parse(content);
  return toElements(parsed);
}

/**
 * All direct children with the given tag name
 */
export function childElements(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter(child => child.name === name);
}

/**
 * First direct child with the given tag name
 */
export function firstChild(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find(child => child.name === name);
}

/**
 * Value of the first `<Option>` child carrying the attribute
 *
 * Code::Blocks writes one attribute per `<Option>` element, so settings are
 * spread across siblings.
 */
export function optionValue(element: XmlElement, attribute: string): string | undefined {
  for (const option of childElements(element, 'Option')) {
    const value = option.attributes[attribute];
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Every value of the attribute across `<Option>` children, in document order
 */
export function optionValues(element: XmlElement, attribute: string): string[] {
  const values: string[] = [];
  for (const option of childElements(element, 'Option')) {
    const value = option.attributes[attribute];
    if (value !== undefined) values.push(value);
  }
  return values;
}

/**
 * Parses a .cbp document and checks the mandatory structure
 *
 * @throws StructuralParseError naming the missing element
 */
export function parseProjectDocument(content: string): CbpDocument {
  const elements = parseXml(content);
  const root = elements[0];

  if (!root || root.name !== ROOT_ELEMENT) {
    throw new StructuralParseError(`Missing <${ROOT_ELEMENT}> root element`);
  }

  const project = firstChild(root, 'Project');
  if (!project) {
    throw new StructuralParseError('Missing <Project> element');
  }

  const builds = childElements(project, 'Build');
  if (builds.length === 0) {
    throw new StructuralParseError('Missing <Build> element');
  }

  const hasTarget = builds.some(build => childElements(build, 'Target').length > 0);
  if (!hasTarget) {
    throw new StructuralParseError('Missing <Target> element inside <Build>');
  }

  return { root, project };
}
