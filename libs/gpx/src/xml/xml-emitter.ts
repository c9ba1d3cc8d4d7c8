import { GpxWriteError } from '../gpx.errors';
import type { XmlSink } from './xml-sink';

export type XmlAttributePair = readonly [name: string, value: string];

/** Prefix to namespace URI; the empty prefix declares the default namespace. */
export type NamespaceDeclarations = Record<string, string>;

export interface XmlEmitterOptions {
  /** Spaces per nesting level. 0 writes everything on one line. */
  indent?: number;
}

interface Frame {
  name: string;
  pending: boolean;
  hasChildren: boolean;
  hasText: boolean;
  namespaces: Map<string, string>;
}

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Streams well-formed XML to a sink. Start tags stay open until their first
 * child or text arrives, so empty elements collapse to `<name/>`.
 */
export class XmlEmitter {
  private readonly stack: Frame[] = [];
  private readonly indent: number;
  private declared = false;

  constructor(
    private readonly sink: XmlSink,
    options: XmlEmitterOptions = {},
  ) {
    this.indent = options.indent ?? 2;
  }

  declaration(): void {
    this.write('<?xml version="1.0" encoding="UTF-8"?>');
    this.declared = true;
  }

  startElement(
    name: string,
    attributes: readonly XmlAttributePair[] = [],
    namespaces: NamespaceDeclarations = {},
  ): void {
    const parent = this.top();
    if (parent) {
      this.closePending(parent);
      parent.hasChildren = true;
      // Indenting inside mixed content would add character data.
      if (!parent.hasText) this.write(this.newline(this.stack.length));
    } else if (this.declared) {
      this.write(this.newline(0));
    }

    let tag = `<${name}`;
    for (const [prefix, uri] of Object.entries(namespaces)) {
      tag += ` ${prefix ? `xmlns:${prefix}` : 'xmlns'}="${escapeXml(uri)}"`;
    }
    for (const [attrName, value] of attributes) {
      tag += ` ${attrName}="${escapeXml(value)}"`;
    }
    this.write(tag);

    this.stack.push({
      name,
      pending: true,
      hasChildren: false,
      hasText: false,
      namespaces: new Map(Object.entries(namespaces)),
    });
  }

  text(value: string): void {
    const frame = this.top();
    if (!frame) {
      throw new GpxWriteError('cannot write text outside of an element');
    }
    this.closePending(frame);
    frame.hasText = true;
    this.write(escapeXml(value));
  }

  endElement(): void {
    const frame = this.stack.pop();
    if (!frame) {
      throw new GpxWriteError('no open element to close');
    }

    if (frame.pending) {
      this.write('/>');
      return;
    }
    if (frame.hasChildren && !frame.hasText) {
      this.write(this.newline(this.stack.length));
    }
    this.write(`</${frame.name}>`);
  }

  textElement(name: string, value: string, attributes: readonly XmlAttributePair[] = []): void {
    this.startElement(name, attributes);
    this.text(value);
    this.endElement();
  }

  emptyElement(name: string, attributes: readonly XmlAttributePair[] = []): void {
    this.startElement(name, attributes);
    this.endElement();
  }

  lookupNamespace(prefix: string): string | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const uri = this.stack[i].namespaces.get(prefix);
      if (uri !== undefined) return uri;
    }
    return undefined;
  }

  private top(): Frame | undefined {
    return this.stack[this.stack.length - 1];
  }

  private closePending(frame: Frame): void {
    if (frame.pending) {
      this.write('>');
      frame.pending = false;
    }
  }

  private newline(depth: number): string {
    return this.indent > 0 ? `\n${' '.repeat(this.indent * depth)}` : '';
  }

  private write(chunk: string): void {
    if (chunk.length === 0) return;
    try {
      this.sink.write(chunk);
    } catch (error) {
      throw new GpxWriteError('failed to write GPX output', { cause: error });
    }
  }
}
