import type { Link } from '../model/gpx.types';
import { writeChildren, writeText, type ElementWriter, type FieldWriter, type WriteContext } from './write-context';

export const linkWriter: ElementWriter<Link> = {
  element: 'link',
  fields: {
    text: (ctx, link, tag) => writeText(ctx, tag, link.text),
    type: (ctx, link, tag) => writeText(ctx, tag, link.type),
  },
};

export function writeLink(ctx: WriteContext, link: Link): void {
  ctx.emitter.startElement('link', [['href', link.href]]);
  writeChildren(ctx, linkWriter, link);
  ctx.emitter.endElement();
}

interface Linked {
  links: Link[];
}

export function linksField<T extends Linked>(): FieldWriter<T> {
  return (ctx, source) => {
    for (const link of source.links) {
      writeLink(ctx, link);
    }
  };
}

/** GPX 1.0 `url`/`urlname`: only the first link survives. */
export function legacyLinkFields<T extends Linked>(): Record<string, FieldWriter<T>> {
  return {
    url: (ctx, source, tag) => writeText(ctx, tag, source.links[0]?.href),
    urlname: (ctx, source, tag) => {
      const first = source.links[0];
      if (first) {
        writeText(ctx, tag, first.text);
      }
    },
  };
}
