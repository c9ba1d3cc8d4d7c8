import type { Copyright } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { consumeChildren, requireAttribute, type ElementParser, type ParseContext } from './parse-context';
import { parseYear } from './scalars';

export const copyrightParser: ElementParser<Copyright> = {
  element: 'copyright',
  text: {
    year: (copyright, text, tag) => {
      copyright.year = parseYear(tag, text);
    },
    license: (copyright, text) => {
      copyright.license = text;
    },
  },
  children: {},
};

export function parseCopyright(ctx: ParseContext, start: StartElement): Copyright {
  const copyright: Copyright = { author: requireAttribute(start, 'author') };
  return consumeChildren(ctx, start, copyrightParser, copyright);
}
