import type { Bounds } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { consumeChildren, requireAttribute, type ElementParser, type ParseContext } from './parse-context';
import { parseDecimal } from './scalars';

export const boundsParser: ElementParser<Bounds> = {
  element: 'bounds',
  text: {},
  children: {},
};

// min <= max is not checked; source values pass through.
export function parseBounds(ctx: ParseContext, start: StartElement): Bounds {
  const bounds: Bounds = {
    minLat: parseDecimal('minlat', requireAttribute(start, 'minlat')),
    minLon: parseDecimal('minlon', requireAttribute(start, 'minlon')),
    maxLat: parseDecimal('maxlat', requireAttribute(start, 'maxlat')),
    maxLon: parseDecimal('maxlon', requireAttribute(start, 'maxlon')),
  };
  return consumeChildren(ctx, start, boundsParser, bounds);
}
