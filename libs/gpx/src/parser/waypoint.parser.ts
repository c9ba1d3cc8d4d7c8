import { createWaypoint, type Waypoint } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { descriptiveBindings, linkBinding } from './descriptive';
import { dropIncompleteLegacyLink } from './link.parser';
import { consumeChildren, requireAttribute, type ElementParser, type ParseContext } from './parse-context';
import {
  parseDateTime,
  parseDecimal,
  parseDegrees,
  parseDgpsStation,
  parseFix,
  parseNonNegativeInteger,
} from './scalars';

export const waypointParser: ElementParser<Waypoint> = {
  element: 'waypoint',
  text: {
    ...descriptiveBindings<Waypoint>(),
    ele: (wpt, text, tag) => {
      wpt.elevation = parseDecimal(tag, text);
    },
    time: (wpt, text, tag) => {
      wpt.time = parseDateTime(tag, text);
    },
    course: (wpt, text, tag) => {
      wpt.course = parseDegrees(tag, text);
    },
    speed: (wpt, text, tag) => {
      wpt.speed = parseDecimal(tag, text);
    },
    magvar: (wpt, text, tag) => {
      wpt.magneticVariation = parseDegrees(tag, text);
    },
    geoidheight: (wpt, text, tag) => {
      wpt.geoidHeight = parseDecimal(tag, text);
    },
    sym: (wpt, text) => {
      wpt.symbol = text;
    },
    fix: (wpt, text, tag) => {
      wpt.fix = parseFix(tag, text);
    },
    sat: (wpt, text, tag) => {
      wpt.satellites = parseNonNegativeInteger(tag, text);
    },
    hdop: (wpt, text, tag) => {
      wpt.hdop = parseDecimal(tag, text);
    },
    vdop: (wpt, text, tag) => {
      wpt.vdop = parseDecimal(tag, text);
    },
    pdop: (wpt, text, tag) => {
      wpt.pdop = parseDecimal(tag, text);
    },
    ageofdgpsdata: (wpt, text, tag) => {
      wpt.dgpsAge = parseDecimal(tag, text);
    },
    dgpsid: (wpt, text, tag) => {
      wpt.dgpsStationId = parseDgpsStation(tag, text);
    },
  },
  children: {
    link: linkBinding<Waypoint>(),
  },
  extensions: (wpt, extensions) => {
    wpt.extensions = extensions;
  },
  finish: dropIncompleteLegacyLink,
};

/** Parses `<wpt>`, `<rtept>` or `<trkpt>`; position comes from the start tag. */
export function parseWaypoint(ctx: ParseContext, start: StartElement): Waypoint {
  const lat = parseDecimal('lat', requireAttribute(start, 'lat'));
  const lon = parseDecimal('lon', requireAttribute(start, 'lon'));
  return consumeChildren(ctx, start, waypointParser, createWaypoint(lat, lon));
}
