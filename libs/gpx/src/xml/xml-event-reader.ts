import { DOMParser } from '@xmldom/xmldom';
import { MalformedXmlError } from '../gpx.errors';
import type { XmlAttribute } from '../model/xml-node';
import type { QualifiedName, XmlEvent } from './xml-event';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function qualifiedName(node: Element | Attr): QualifiedName {
  const name: QualifiedName = {
    qualified: node.nodeName,
    local: node.localName ?? node.nodeName,
  };
  if (node.prefix) name.prefix = node.prefix;
  if (node.namespaceURI) name.namespace = node.namespaceURI;
  return name;
}

function readAttributes(element: Element): XmlAttribute[] {
  const attributes: XmlAttribute[] = [];

  for (let i = 0; i < element.attributes.length; i++) {
    const attr = element.attributes.item(i);
    // Namespace declarations are scope information, re-created on write.
    if (!attr || attr.namespaceURI === XMLNS_NAMESPACE) continue;

    const name = qualifiedName(attr);
    const attribute: XmlAttribute = { name: name.qualified, localName: name.local, value: attr.value };
    if (name.prefix) attribute.prefix = name.prefix;
    if (name.namespace) attribute.namespace = name.namespace;
    attributes.push(attribute);
  }

  return attributes;
}

function* walk(element: Element): Generator<XmlEvent> {
  const name = qualifiedName(element);
  yield { type: 'start', name, attributes: readAttributes(element) };

  for (let i = 0; i < element.childNodes.length; i++) {
    const child = element.childNodes.item(i);
    if (isElement(child)) {
      yield* walk(child);
    } else if (child.nodeType === TEXT_NODE) {
      yield { type: 'text', text: child.nodeValue ?? '' };
    } else if (child.nodeType === CDATA_SECTION_NODE) {
      yield { type: 'cdata', text: child.nodeValue ?? '' };
    }
  }

  yield { type: 'end', name };
}

function closeAfter(source: string, terminator: string, from: number): number {
  const index = source.indexOf(terminator, from);
  return index === -1 ? -1 : index + terminator.length;
}

/** Index just past the markup construct opening at `start`, or -1 if it never closes. */
function markupEnd(source: string, start: number): number {
  if (source.startsWith('<!--', start)) return closeAfter(source, '-->', start + 4);
  if (source.startsWith('<![CDATA[', start)) return closeAfter(source, ']]>', start + 9);
  if (source.startsWith('<?', start)) return closeAfter(source, '?>', start + 2);

  const declaration = source.startsWith('<!', start);
  let quote: string | undefined;
  let subset = false;
  for (let i = start + 1; i < source.length; i++) {
    const char = source[i];
    if (quote) {
      if (char === quote) quote = undefined;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (declaration && char === '[') {
      subset = true;
    } else if (declaration && char === ']') {
      subset = false;
    } else if (char === '>' && !subset) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Cuts `source` just after the root element closes so that trailing content
 * is never tokenized. Markup the scan cannot close is left whole for the DOM
 * parser to report.
 */
function cutAfterRoot(source: string): string {
  let depth = 0;
  let start = source.indexOf('<');

  while (start !== -1) {
    const end = markupEnd(source, start);
    if (end === -1) return source;

    const closing = source[start + 1] === '/';
    const opening = !closing && /^<[^!?]/.test(source.slice(start, start + 2));
    if (closing) {
      depth--;
    } else if (opening && source[end - 2] !== '/') {
      depth++;
    }
    if ((closing || opening) && depth <= 0) {
      return source.slice(0, end);
    }

    start = source.indexOf('<', end);
  }

  return source;
}

/**
 * Pull-style event source over an XML document. Tokenizing is done by
 * `@xmldom/xmldom`. Anything it reports, warnings included, aborts the read:
 * xmldom repairs mismatched tags and unquoted attributes with only a warning.
 */
export class XmlEventReader {
  private readonly events: Iterator<XmlEvent>;

  constructor(source: string) {
    const errors: string[] = [];
    const record = (message: unknown) => {
      errors.push(String(message).trim());
    };

    let doc: Document;
    try {
      doc = new DOMParser({
        errorHandler: { warning: record, error: record, fatalError: record },
      }).parseFromString(cutAfterRoot(source), 'text/xml');
    } catch (error) {
      throw new MalformedXmlError(error instanceof Error ? error.message : String(error));
    }

    if (errors.length > 0) {
      throw new MalformedXmlError(errors[0]);
    }

    const root = doc.documentElement;
    if (!root) {
      throw new MalformedXmlError('document has no root element');
    }

    this.events = walk(root);
  }

  next(): XmlEvent | undefined {
    const result = this.events.next();
    return result.done ? undefined : result.value;
  }
}
