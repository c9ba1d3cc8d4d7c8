import { createMetadata, type Gpx, type Metadata, type Person } from '../model/gpx.types';
import type { StartElement } from '../xml/xml-event';
import { parseBounds } from './bounds.parser';
import { dropIncompleteLegacyLink, legacyLinkBindings } from './link.parser';
import { parseMetadata } from './metadata.parser';
import { consumeChildren, type ElementParser, type ParseContext, type TextBinding } from './parse-context';
import { parseRoute } from './route.parser';
import { parseDateTime } from './scalars';
import { parseTrack } from './track.parser';
import { parseWaypoint } from './waypoint.parser';

function metadataOf(gpx: Gpx): Metadata {
  if (!gpx.metadata) {
    gpx.metadata = createMetadata();
  }
  return gpx.metadata;
}

function authorOf(gpx: Gpx): Person {
  const metadata = metadataOf(gpx);
  if (!metadata.author) {
    metadata.author = {};
  }
  return metadata.author;
}

// GPX 1.0 root-level descriptive fields land in the same Metadata a 1.1
// document would carry.
function toMetadata(bind: TextBinding<Metadata>): TextBinding<Gpx> {
  return (gpx, text, tag) => bind(metadataOf(gpx), text, tag);
}

const legacyUrl = legacyLinkBindings<Metadata>();

export const gpxParser: ElementParser<Gpx> = {
  element: 'gpx',
  text: {
    name: toMetadata((metadata, text) => {
      metadata.name = text;
    }),
    desc: toMetadata((metadata, text) => {
      metadata.description = text;
    }),
    author: (gpx, text) => {
      authorOf(gpx).name = text;
    },
    email: (gpx, text) => {
      authorOf(gpx).email = text;
    },
    url: toMetadata(legacyUrl.url),
    urlname: toMetadata(legacyUrl.urlname),
    time: toMetadata((metadata, text, tag) => {
      metadata.time = parseDateTime(tag, text);
    }),
    keywords: toMetadata((metadata, text) => {
      metadata.keywords = text;
    }),
  },
  children: {
    bounds: (ctx, start, gpx) => {
      metadataOf(gpx).bounds = parseBounds(ctx, start);
    },
    metadata: (ctx, start, gpx) => {
      gpx.metadata = parseMetadata(ctx, start);
    },
    wpt: (ctx, start, gpx) => {
      gpx.waypoints.push(parseWaypoint(ctx, start));
    },
    rte: (ctx, start, gpx) => {
      gpx.routes.push(parseRoute(ctx, start));
    },
    trk: (ctx, start, gpx) => {
      gpx.tracks.push(parseTrack(ctx, start));
    },
  },
  extensions: (gpx, extensions) => {
    gpx.extensions = extensions;
  },
  finish: (ctx, gpx, start) => {
    if (gpx.metadata) {
      dropIncompleteLegacyLink(ctx, gpx.metadata, start);
    }
  },
};

/** Consumes the root element's children into `gpx`. */
export function parseGpx(ctx: ParseContext, start: StartElement, gpx: Gpx): Gpx {
  return consumeChildren(ctx, start, gpxParser, gpx);
}
