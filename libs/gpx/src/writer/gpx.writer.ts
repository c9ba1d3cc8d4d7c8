import { Logger } from '@nestjs/common';
import type { GpxWriter, GpxWriterOptions, WriteOptions } from '../gpx-codec.interface';
import { GPX_NAMESPACES, GPX_SCHEMA_LOCATIONS, XSI_NAMESPACE } from '../gpx-version';
import type { Gpx, Link } from '../model/gpx.types';
import { XmlEmitter, type XmlAttributePair } from '../xml/xml-emitter';
import { StringSink, type XmlSink } from '../xml/xml-sink';
import { legacyLinkFields } from './link.writer';
import { writeBounds, writeMetadata } from './metadata.writer';
import { writeRoute, writeTrack } from './track.writer';
import { writeWaypoint } from './waypoint.writer';
import { writeChildren, writeText, writeTime, type ElementWriter, type WriteContext } from './write-context';

const NO_LINKS: { links: Link[] } = { links: [] };
const legacyUrl = legacyLinkFields<{ links: Link[] }>();

export const gpxWriter: ElementWriter<Gpx> = {
  element: 'gpx',
  fields: {
    name: (ctx, gpx, tag) => writeText(ctx, tag, gpx.metadata?.name),
    desc: (ctx, gpx, tag) => writeText(ctx, tag, gpx.metadata?.description),
    author: (ctx, gpx, tag) => writeText(ctx, tag, gpx.metadata?.author?.name),
    email: (ctx, gpx, tag) => writeText(ctx, tag, gpx.metadata?.author?.email),
    url: (ctx, gpx, tag) => legacyUrl.url(ctx, gpx.metadata ?? NO_LINKS, tag),
    urlname: (ctx, gpx, tag) => legacyUrl.urlname(ctx, gpx.metadata ?? NO_LINKS, tag),
    time: (ctx, gpx, tag) => writeTime(ctx, tag, gpx.metadata?.time),
    keywords: (ctx, gpx, tag) => writeText(ctx, tag, gpx.metadata?.keywords),
    bounds: (ctx, gpx) => {
      if (gpx.metadata?.bounds) {
        writeBounds(ctx, gpx.metadata.bounds);
      }
    },
    metadata: (ctx, gpx) => {
      if (gpx.metadata) {
        writeMetadata(ctx, gpx.metadata);
      }
    },
    wpt: (ctx, gpx, tag) => {
      for (const wpt of gpx.waypoints) {
        writeWaypoint(ctx, tag, wpt);
      }
    },
    rte: (ctx, gpx) => {
      for (const route of gpx.routes) {
        writeRoute(ctx, route);
      }
    },
    trk: (ctx, gpx) => {
      for (const track of gpx.tracks) {
        writeTrack(ctx, track);
      }
    },
  },
  extensions: (gpx) => gpx.extensions,
};

export class XmlGpxWriter implements GpxWriter {
  private readonly logger = new Logger(XmlGpxWriter.name);

  constructor(private readonly options: GpxWriterOptions = {}) {}

  write(gpx: Gpx, sink: XmlSink, options: WriteOptions = {}): void {
    const version = options.version ?? gpx.version;
    const emitter = new XmlEmitter(sink, { indent: this.options.indent });
    const ctx: WriteContext = { emitter, version };

    const attributes: XmlAttributePair[] = [['version', version]];
    const creator = gpx.creator ?? this.options.creator;
    if (creator !== undefined) {
      attributes.push(['creator', creator]);
    }
    attributes.push(['xsi:schemaLocation', GPX_SCHEMA_LOCATIONS[version]]);

    emitter.declaration();
    emitter.startElement('gpx', attributes, { '': GPX_NAMESPACES[version], xsi: XSI_NAMESPACE });
    writeChildren(ctx, gpxWriter, gpx);
    emitter.endElement();

    this.logger.debug(
      version === gpx.version ? `Wrote GPX ${version} document` : `Wrote GPX ${gpx.version} document as ${version}`,
    );
  }

  writeToString(gpx: Gpx, options?: WriteOptions): string {
    const sink = new StringSink();
    this.write(gpx, sink, options);
    return sink.toString();
  }
}

export function writeGpx(gpx: Gpx, sink: XmlSink, options?: WriteOptions & GpxWriterOptions): void {
  new XmlGpxWriter(options).write(gpx, sink, options);
}

export function writeGpxToString(gpx: Gpx, options?: WriteOptions & GpxWriterOptions): string {
  return new XmlGpxWriter(options).writeToString(gpx, options);
}
