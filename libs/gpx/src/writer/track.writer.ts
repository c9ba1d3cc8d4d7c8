import type { Link, Route, Track, TrackSegment } from '../model/gpx.types';
import { legacyLinkFields, linksField } from './link.writer';
import { writeWaypoint } from './waypoint.writer';
import {
  writeChildren,
  writeNumber,
  writeText,
  type ElementWriter,
  type FieldWriter,
  type WriteContext,
} from './write-context';

interface Described {
  name?: string;
  comment?: string;
  description?: string;
  source?: string;
  links: Link[];
  type?: string;
  number?: number;
}

function descriptiveFields<T extends Described>(): Record<string, FieldWriter<T>> {
  return {
    name: (ctx, source, tag) => writeText(ctx, tag, source.name),
    cmt: (ctx, source, tag) => writeText(ctx, tag, source.comment),
    desc: (ctx, source, tag) => writeText(ctx, tag, source.description),
    src: (ctx, source, tag) => writeText(ctx, tag, source.source),
    ...legacyLinkFields<T>(),
    link: linksField<T>(),
    number: (ctx, source, tag) => writeNumber(ctx, tag, source.number),
    type: (ctx, source, tag) => writeText(ctx, tag, source.type),
  };
}

export const trackSegmentWriter: ElementWriter<TrackSegment> = {
  element: 'trackSegment',
  fields: {
    trkpt: (ctx, segment, tag) => {
      for (const point of segment.points) {
        writeWaypoint(ctx, tag, point);
      }
    },
  },
  extensions: (segment) => segment.extensions,
};

export const trackWriter: ElementWriter<Track> = {
  element: 'track',
  fields: {
    ...descriptiveFields<Track>(),
    trkseg: (ctx, track, tag) => {
      for (const segment of track.segments) {
        ctx.emitter.startElement(tag);
        writeChildren(ctx, trackSegmentWriter, segment);
        ctx.emitter.endElement();
      }
    },
  },
  extensions: (track) => track.extensions,
};

export const routeWriter: ElementWriter<Route> = {
  element: 'route',
  fields: {
    ...descriptiveFields<Route>(),
    rtept: (ctx, route, tag) => {
      for (const point of route.points) {
        writeWaypoint(ctx, tag, point);
      }
    },
  },
  extensions: (route) => route.extensions,
};

export function writeTrack(ctx: WriteContext, track: Track): void {
  ctx.emitter.startElement('trk');
  writeChildren(ctx, trackWriter, track);
  ctx.emitter.endElement();
}

export function writeRoute(ctx: WriteContext, route: Route): void {
  ctx.emitter.startElement('rte');
  writeChildren(ctx, routeWriter, route);
  ctx.emitter.endElement();
}
