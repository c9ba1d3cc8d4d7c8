import type { Logger } from '@nestjs/common';
import {
  GpxParseError,
  InvalidChildElementError,
  MalformedXmlError,
  MissingAttributeError,
} from '../gpx.errors';
import { resolveChild, type GpxElement } from '../gpx-schema';
import type { GpxVersion } from '../gpx-version';
import type { Extensions } from '../model/gpx.types';
import type { XmlNode } from '../model/xml-node';
import { attributeValue, type StartElement, type XmlEvent } from '../xml/xml-event';
import type { XmlEventReader } from '../xml/xml-event-reader';

export interface ParseContext {
  readonly events: XmlEventReader;
  readonly version: GpxVersion;
  /** Namespace of the root element; GPX children must share it. */
  readonly namespace?: string;
  readonly logger: Logger;
}

export type TextBinding<T> = (target: T, text: string, tag: string) => void;

export type ElementBinding<T> = (ctx: ParseContext, start: StartElement, target: T) => void;

/**
 * Binds the tags the schema table allows under an element to the fields of
 * the entity being built. Which tags are legal, and in which version, is
 * decided by the table alone.
 */
export interface ElementParser<T> {
  element: GpxElement;
  text: Readonly<Record<string, TextBinding<T>>>;
  children: Readonly<Record<string, ElementBinding<T>>>;
  extensions?: (target: T, extensions: Extensions) => void;
  /** Runs once the end tag has been consumed. */
  finish?: (ctx: ParseContext, target: T, start: StartElement) => void;
}

function nextEvent(ctx: ParseContext, start: StartElement): XmlEvent {
  const event = ctx.events.next();
  if (!event) {
    throw new MalformedXmlError(`missing end tag for '${start.name.qualified}'`);
  }
  return event;
}

export function requireAttribute(start: StartElement, name: string): string {
  const value = attributeValue(start, name);
  if (value === undefined) {
    throw new MissingAttributeError(name, start.name.local);
  }
  return value;
}

/** Consumes a scalar element and returns its character data verbatim. */
export function readText(ctx: ParseContext, start: StartElement): string {
  let text = '';

  for (;;) {
    const event = nextEvent(ctx, start);
    switch (event.type) {
      case 'text':
      case 'cdata':
        text += event.text;
        break;
      case 'start':
        throw new InvalidChildElementError(event.name.local, start.name.local);
      case 'end':
        return text;
    }
  }
}

/** Captures an element and everything below it without interpreting it. */
export function readExtensions(ctx: ParseContext, start: StartElement): XmlNode {
  const node: XmlNode = {
    name: start.name.qualified,
    localName: start.name.local,
    attributes: start.attributes.map((attr) => ({ ...attr })),
    children: [],
  };
  if (start.name.prefix) node.prefix = start.name.prefix;
  if (start.name.namespace) node.namespace = start.name.namespace;

  let text = '';
  const flush = () => {
    const trimmed = text.trim();
    const last = node.children[node.children.length - 1];
    if (trimmed && last) {
      last.tail = trimmed;
    } else if (trimmed) {
      node.text = trimmed;
    }
    text = '';
  };

  for (;;) {
    const event = nextEvent(ctx, start);
    switch (event.type) {
      case 'text':
      case 'cdata':
        text += event.text;
        break;
      case 'start':
        flush();
        node.children.push(readExtensions(ctx, event));
        break;
      case 'end':
        flush();
        return node;
    }
  }
}

function dispatchChild<T>(
  ctx: ParseContext,
  parent: StartElement,
  child: StartElement,
  parser: ElementParser<T>,
  target: T,
): void {
  if (child.name.namespace !== ctx.namespace) {
    throw new InvalidChildElementError(child.name.qualified, parent.name.local);
  }

  const tag = child.name.local;
  const resolved = resolveChild(ctx.version, parser.element, tag);

  switch (resolved.action) {
    case 'extensions': {
      const extensions = readExtensions(ctx, child);
      if (parser.extensions) {
        parser.extensions(target, extensions);
      } else {
        ctx.logger.warn(`Dropping <extensions> inside <${parent.name.local}>: nowhere to store it`);
      }
      return;
    }
    case 'text': {
      const bind = parser.text[tag];
      if (!bind) {
        throw new GpxParseError(`no text binding for '${tag}' in '${parser.element}'`);
      }
      bind(target, readText(ctx, child), tag);
      return;
    }
    case 'element': {
      const bind = parser.children[tag];
      if (!bind) {
        throw new GpxParseError(`no element binding for '${tag}' in '${parser.element}'`);
      }
      bind(ctx, child, target);
      return;
    }
    case 'reject':
      throw new InvalidChildElementError(tag, parent.name.local);
  }
}

/**
 * Generic dispatch loop shared by every element parser: consumes events up to
 * and including the end tag matching `start`.
 */
export function consumeChildren<T>(
  ctx: ParseContext,
  start: StartElement,
  parser: ElementParser<T>,
  target: T,
): T {
  for (;;) {
    const event = nextEvent(ctx, start);
    switch (event.type) {
      case 'start':
        dispatchChild(ctx, start, event, parser, target);
        break;
      case 'text':
      case 'cdata':
        // Character data between child elements carries no meaning here.
        break;
      case 'end':
        parser.finish?.(ctx, target, start);
        return target;
    }
  }
}
