import { createTrack, createTrackSegment, type Track, type TrackSegment } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { descriptiveBindings, linkBinding, numberBinding } from './descriptive';
import { dropIncompleteLegacyLink } from './link.parser';
import { consumeChildren, type ElementParser, type ParseContext } from './parse-context';
import { parseWaypoint } from './waypoint.parser';

export const trackSegmentParser: ElementParser<TrackSegment> = {
  element: 'trackSegment',
  text: {},
  children: {
    trkpt: (ctx, start, segment) => {
      segment.points.push(parseWaypoint(ctx, start));
    },
  },
  extensions: (segment, extensions) => {
    segment.extensions = extensions;
  },
};

export function parseTrackSegment(ctx: ParseContext, start: StartElement): TrackSegment {
  return consumeChildren(ctx, start, trackSegmentParser, createTrackSegment());
}

export const trackParser: ElementParser<Track> = {
  element: 'track',
  text: {
    ...descriptiveBindings<Track>(),
    number: numberBinding<Track>(),
  },
  children: {
    link: linkBinding<Track>(),
    trkseg: (ctx, start, track) => {
      track.segments.push(parseTrackSegment(ctx, start));
    },
  },
  extensions: (track, extensions) => {
    track.extensions = extensions;
  },
  finish: dropIncompleteLegacyLink,
};

export function parseTrack(ctx: ParseContext, start: StartElement): Track {
  return consumeChildren(ctx, start, trackParser, createTrack());
}
