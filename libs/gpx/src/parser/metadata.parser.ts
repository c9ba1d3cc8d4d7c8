import { createMetadata, type Metadata } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { parseBounds } from './bounds.parser';
import { parseCopyright } from './copyright.parser';
import { linkBinding } from './descriptive';
import { consumeChildren, type ElementParser, type ParseContext } from './parse-context';
import { parsePerson } from './person.parser';
import { parseDateTime } from './scalars';

export const metadataParser: ElementParser<Metadata> = {
  element: 'metadata',
  text: {
    name: (metadata, text) => {
      metadata.name = text;
    },
    desc: (metadata, text) => {
      metadata.description = text;
    },
    time: (metadata, text, tag) => {
      metadata.time = parseDateTime(tag, text);
    },
    keywords: (metadata, text) => {
      metadata.keywords = text;
    },
  },
  children: {
    author: (ctx, start, metadata) => {
      metadata.author = parsePerson(ctx, start);
    },
    copyright: (ctx, start, metadata) => {
      metadata.copyright = parseCopyright(ctx, start);
    },
    link: linkBinding<Metadata>(),
    bounds: (ctx, start, metadata) => {
      metadata.bounds = parseBounds(ctx, start);
    },
  },
  extensions: (metadata, extensions) => {
    metadata.extensions = extensions;
  },
};

export function parseMetadata(ctx: ParseContext, start: StartElement): Metadata {
  return consumeChildren(ctx, start, metadataParser, createMetadata());
}
