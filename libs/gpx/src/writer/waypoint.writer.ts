import type { Waypoint } from '../model/gpx.types';
import { legacyLinkFields, linksField } from './link.writer';
import {
  formatNumber,
  writeChildren,
  writeNumber,
  writeText,
  writeTime,
  type ElementWriter,
  type WriteContext,
} from './write-context';

export const waypointWriter: ElementWriter<Waypoint> = {
  element: 'waypoint',
  fields: {
    ele: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.elevation),
    time: (ctx, wpt, tag) => writeTime(ctx, tag, wpt.time),
    course: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.course),
    speed: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.speed),
    magvar: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.magneticVariation),
    geoidheight: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.geoidHeight),
    name: (ctx, wpt, tag) => writeText(ctx, tag, wpt.name),
    cmt: (ctx, wpt, tag) => writeText(ctx, tag, wpt.comment),
    desc: (ctx, wpt, tag) => writeText(ctx, tag, wpt.description),
    src: (ctx, wpt, tag) => writeText(ctx, tag, wpt.source),
    ...legacyLinkFields<Waypoint>(),
    link: linksField<Waypoint>(),
    sym: (ctx, wpt, tag) => writeText(ctx, tag, wpt.symbol),
    type: (ctx, wpt, tag) => writeText(ctx, tag, wpt.type),
    fix: (ctx, wpt, tag) => writeText(ctx, tag, wpt.fix),
    sat: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.satellites),
    hdop: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.hdop),
    vdop: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.vdop),
    pdop: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.pdop),
    ageofdgpsdata: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.dgpsAge),
    dgpsid: (ctx, wpt, tag) => writeNumber(ctx, tag, wpt.dgpsStationId),
  },
  extensions: (wpt) => wpt.extensions,
};

/** Writes a point as `wpt`, `rtept` or `trkpt` depending on its owner. */
export function writeWaypoint(ctx: WriteContext, tag: string, wpt: Waypoint): void {
  ctx.emitter.startElement(tag, [
    ['lat', formatNumber('lat', wpt.lat)],
    ['lon', formatNumber('lon', wpt.lon)],
  ]);
  writeChildren(ctx, waypointWriter, wpt);
  ctx.emitter.endElement();
}
