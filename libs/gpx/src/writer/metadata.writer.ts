import type { Bounds, Copyright, Metadata } from '../model/gpx.types';
import { linksField } from './link.writer';
import { writePerson } from './person.writer';
import {
  formatNumber,
  writeChildren,
  writeNumber,
  writeText,
  writeTime,
  type ElementWriter,
  type WriteContext,
} from './write-context';

export const copyrightWriter: ElementWriter<Copyright> = {
  element: 'copyright',
  fields: {
    year: (ctx, copyright, tag) => writeNumber(ctx, tag, copyright.year),
    license: (ctx, copyright, tag) => writeText(ctx, tag, copyright.license),
  },
};

export function writeCopyright(ctx: WriteContext, copyright: Copyright): void {
  ctx.emitter.startElement('copyright', [['author', copyright.author]]);
  writeChildren(ctx, copyrightWriter, copyright);
  ctx.emitter.endElement();
}

export function writeBounds(ctx: WriteContext, bounds: Bounds): void {
  ctx.emitter.emptyElement('bounds', [
    ['minlat', formatNumber('minlat', bounds.minLat)],
    ['minlon', formatNumber('minlon', bounds.minLon)],
    ['maxlat', formatNumber('maxlat', bounds.maxLat)],
    ['maxlon', formatNumber('maxlon', bounds.maxLon)],
  ]);
}

export const metadataWriter: ElementWriter<Metadata> = {
  element: 'metadata',
  fields: {
    name: (ctx, metadata, tag) => writeText(ctx, tag, metadata.name),
    desc: (ctx, metadata, tag) => writeText(ctx, tag, metadata.description),
    author: (ctx, metadata, tag) => {
      if (metadata.author) {
        writePerson(ctx, tag, metadata.author);
      }
    },
    copyright: (ctx, metadata) => {
      if (metadata.copyright) {
        writeCopyright(ctx, metadata.copyright);
      }
    },
    link: linksField<Metadata>(),
    time: (ctx, metadata, tag) => writeTime(ctx, tag, metadata.time),
    keywords: (ctx, metadata, tag) => writeText(ctx, tag, metadata.keywords),
    bounds: (ctx, metadata) => {
      if (metadata.bounds) {
        writeBounds(ctx, metadata.bounds);
      }
    },
  },
  extensions: (metadata) => metadata.extensions,
};

export function writeMetadata(ctx: WriteContext, metadata: Metadata): void {
  ctx.emitter.startElement('metadata');
  writeChildren(ctx, metadataWriter, metadata);
  ctx.emitter.endElement();
}
