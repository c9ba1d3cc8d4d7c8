import { GpxWriteError } from '../gpx.errors';
import { allowedChildren, EXTENSIONS_TAG, GPX_SCHEMA, type GpxElement } from '../gpx-schema';
import type { GpxVersion } from '../gpx-version';
import type { Extensions } from '../model/gpx.types';
import type { XmlNode } from '../model/xml-node';
import type { NamespaceDeclarations, XmlAttributePair, XmlEmitter } from '../xml/xml-emitter';

export interface WriteContext {
  readonly emitter: XmlEmitter;
  readonly version: GpxVersion;
}

export type FieldWriter<T> = (ctx: WriteContext, source: T, tag: string) => void;

/**
 * Mirror of `ElementParser`: one writer per tag the schema table lists for
 * the element. Emission order and version filtering come from the table.
 */
export interface ElementWriter<T> {
  element: GpxElement;
  fields: Readonly<Record<string, FieldWriter<T>>>;
  extensions?: (source: T) => Extensions | undefined;
}

const XML_PREFIX = 'xml';

export function writeChildren<T>(ctx: WriteContext, writer: ElementWriter<T>, source: T): void {
  for (const rule of allowedChildren(ctx.version, writer.element)) {
    const write = writer.fields[rule.tag];
    if (!write) {
      throw new GpxWriteError(`no writer for '${rule.tag}' in '${writer.element}'`);
    }
    write(ctx, source, rule.tag);
  }

  const extensions = writer.extensions?.(source);
  if (extensions && GPX_SCHEMA[writer.element].extensions) {
    writeExtensions(ctx, extensions);
  }
}

export function writeText(ctx: WriteContext, tag: string, value: string | undefined): void {
  if (value !== undefined) {
    ctx.emitter.textElement(tag, value);
  }
}

const EXPONENTIAL = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/** xsd:decimal has no exponent; spell the shortest round-trip digits out in full. */
export function formatNumber(tag: string, value: number): string {
  if (!Number.isFinite(value)) {
    throw new GpxWriteError(`cannot write non-finite number ${value} for '${tag}'`);
  }

  const text = String(value);
  const match = EXPONENTIAL.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction = '', exponentText] = match;
  const digits = lead + fraction;
  const exponent = Number(exponentText);
  return exponent < 0
    ? `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`
    : `${sign}${digits.padEnd(exponent + 1, '0')}`;
}

export function writeNumber(ctx: WriteContext, tag: string, value: number | undefined): void {
  if (value !== undefined) {
    ctx.emitter.textElement(tag, formatNumber(tag, value));
  }
}

export function formatTime(tag: string, value: Date): string {
  if (Number.isNaN(value.getTime())) {
    throw new GpxWriteError(`cannot write invalid date for '${tag}'`);
  }
  const iso = value.toISOString();
  return value.getUTCMilliseconds() === 0 ? iso.replace('.000Z', 'Z') : iso;
}

export function writeTime(ctx: WriteContext, tag: string, value: Date | undefined): void {
  if (value !== undefined) {
    ctx.emitter.textElement(tag, formatTime(tag, value));
  }
}

function namespaceDeclarations(emitter: XmlEmitter, node: XmlNode): NamespaceDeclarations {
  const declarations: NamespaceDeclarations = {};
  const prefix = node.prefix ?? '';
  const inScope = emitter.lookupNamespace(prefix);

  if (node.namespace !== undefined) {
    if (inScope !== node.namespace) declarations[prefix] = node.namespace;
  } else if (prefix === '' && inScope) {
    declarations[''] = '';
  }

  for (const attr of node.attributes) {
    if (!attr.prefix || !attr.namespace || attr.prefix === XML_PREFIX) continue;
    if (declarations[attr.prefix] === undefined && emitter.lookupNamespace(attr.prefix) !== attr.namespace) {
      declarations[attr.prefix] = attr.namespace;
    }
  }

  return declarations;
}

function writeNodeContent(ctx: WriteContext, node: XmlNode): void {
  if (node.text !== undefined) {
    ctx.emitter.text(node.text);
  }
  for (const child of node.children) {
    writeXmlNode(ctx, child);
    if (child.tail !== undefined) {
      ctx.emitter.text(child.tail);
    }
  }
  ctx.emitter.endElement();
}

export function writeXmlNode(ctx: WriteContext, node: XmlNode): void {
  const attributes: XmlAttributePair[] = node.attributes.map((attr) => [attr.name, attr.value]);
  ctx.emitter.startElement(node.name, attributes, namespaceDeclarations(ctx.emitter, node));
  writeNodeContent(ctx, node);
}

/** The `<extensions>` wrapper always lands in the GPX namespace of the output. */
export function writeExtensions(ctx: WriteContext, extensions: Extensions): void {
  const attributes: XmlAttributePair[] = extensions.attributes.map((attr) => [attr.name, attr.value]);
  ctx.emitter.startElement(EXTENSIONS_TAG, attributes);
  writeNodeContent(ctx, extensions);
}
