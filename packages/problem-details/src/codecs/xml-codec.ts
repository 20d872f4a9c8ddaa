import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';

import { createMalformedDocument } from '../problem/errors';
import { ExtensionMembers } from '../problem/extension-members';
import {
  fixedFieldEntries,
  isReservedField,
  readProblemField,
  type ProblemFields,
} from '../problem/fields';
import { setMember, type JsonObject, type JsonValue, type XmlValue } from '../problem/json-value';
import { ProblemDetails } from '../problem/problem-details';
import { BaseProblemCodec } from './codec';

export const PROBLEM_XML_CONTENT_TYPE = 'application/problem+xml';
export const PROBLEM_XML_NAMESPACE = 'urn:ietf:rfc:7807';

const ROOT_ELEMENT = 'problem';
const LIST_ITEM_ELEMENT = 'i';
const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';
const ELEMENT_NAME_PATTERN = /^[A-Za-z_][\w.-]*$/;
const DECIMAL_PATTERN = /^\d+$/;

type BuilderNode = string | { [element: string]: BuilderNode | BuilderNode[] };

export function isXmlElementName(name: string): boolean {
  return ELEMENT_NAME_PATTERN.test(name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encodes problems as RFC 7807 Appendix A XML: a `problem` root in the
 * `urn:ietf:rfc:7807` namespace, one child element per member, lists as
 * repeated `<i>` elements.
 */
export class XmlProblemCodec extends BaseProblemCodec {
  readonly format = 'xml';
  readonly contentType = PROBLEM_XML_CONTENT_TYPE;
  readonly mediaTypes = [PROBLEM_XML_CONTENT_TYPE, 'application/xml', 'text/xml'];

  private readonly builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    suppressEmptyNode: true,
    format: false,
  });

  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    isArray: (name: string, jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
      !isAttribute && name === LIST_ITEM_ELEMENT && jPath.split('.').length > 2,
  });

  serialize(problem: ProblemDetails): string {
    const root: { [element: string]: BuilderNode } = {};
    setMember(root, `${ATTRIBUTE_PREFIX}xmlns`, PROBLEM_XML_NAMESPACE);

    for (const [name, value] of fixedFieldEntries(problem)) {
      setMember(root, name, String(value));
    }

    for (const member of problem.extensions) {
      if (!isXmlElementName(member.name)) {
        this.logger.warn({ member: member.name }, 'Skipping extension member with no XML element form');
        continue;
      }

      setMember(root, member.name, this.toBuilderNode(member.xml, member.name));
    }

    return this.builder.build({ [ROOT_ELEMENT]: root });
  }

  parse(text: string): ProblemDetails {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      throw createMalformedDocument(
        `invalid XML at line ${validation.err.line}: ${validation.err.msg}`,
        validation.err,
      );
    }

    let document: unknown;
    try {
      document = this.parser.parse(text);
    } catch (error) {
      throw createMalformedDocument('body is not valid XML', error);
    }

    if (!isRecord(document)) {
      throw createMalformedDocument('document has no root element');
    }

    const roots = Object.keys(document).filter((name) => !name.startsWith('?') && !name.startsWith('#'));
    if (roots.length !== 1 || roots[0] !== ROOT_ELEMENT) {
      throw createMalformedDocument(`root element must be <${ROOT_ELEMENT}>`);
    }

    const root = document[ROOT_ELEMENT];
    if (!isRecord(root) || root[`${ATTRIBUTE_PREFIX}xmlns`] !== PROBLEM_XML_NAMESPACE) {
      throw createMalformedDocument(`root element must be in the ${PROBLEM_XML_NAMESPACE} namespace`);
    }

    const fields: ProblemFields = {};
    const extensions: Array<[string, JsonValue]> = [];
    for (const [name, node] of Object.entries(root)) {
      if (name.startsWith(ATTRIBUTE_PREFIX) || name === TEXT_NODE) {
        continue;
      }

      if (isReservedField(name)) {
        const value = readFieldNode(node);
        readProblemField(
          fields,
          name,
          name === 'status' && typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())
            ? Number(value.trim())
            : value,
        );
      } else {
        extensions.push([name, readElement(node)]);
      }
    }

    return ProblemDetails.fromFields(fields, ExtensionMembers.from(extensions));
  }

  private toBuilderNode(value: XmlValue, path: string): BuilderNode {
    if (typeof value === 'string') {
      return value;
    }

    if (Array.isArray(value)) {
      if (value.length === 0) {
        return '';
      }

      return {
        [LIST_ITEM_ELEMENT]: value.map((item, index) => this.toBuilderNode(item, `${path}[${index}]`)),
      };
    }

    const element: { [name: string]: BuilderNode } = {};
    for (const [name, member] of Object.entries(value)) {
      if (!isXmlElementName(name)) {
        this.logger.warn({ member: `${path}.${name}` }, 'Skipping extension member with no XML element form');
        continue;
      }

      setMember(element, name, this.toBuilderNode(member, `${path}.${name}`));
    }

    return Object.keys(element).length > 0 ? element : '';
  }
}

// Fixed fields are text-only elements; anything else fails field validation.
function readFieldNode(node: unknown): unknown {
  if (Array.isArray(node)) {
    return node;
  }

  const value = readElement(node);
  return typeof value === 'string' ? value : node;
}

function readElement(node: unknown): JsonValue {
  if (typeof node === 'string') {
    return node;
  }

  if (typeof node === 'number' || typeof node === 'boolean') {
    return String(node);
  }

  if (Array.isArray(node)) {
    return node.map((item: unknown) => readElement(item));
  }

  if (!isRecord(node)) {
    return '';
  }

  const children = Object.entries(node).filter(
    ([name]) => !name.startsWith(ATTRIBUTE_PREFIX) && name !== TEXT_NODE,
  );

  if (children.length === 0) {
    const text = node[TEXT_NODE];
    return text === undefined ? '' : readElement(text);
  }

  if (children.length === 1 && children[0]?.[0] === LIST_ITEM_ELEMENT) {
    const items = children[0][1];
    return Array.isArray(items) ? items.map((item: unknown) => readElement(item)) : [readElement(items)];
  }

  const element: JsonObject = {};
  for (const [name, child] of children) {
    setMember(element, name, readElement(child));
  }

  return element;
}
