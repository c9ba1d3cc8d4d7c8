import { Logger } from '@nestjs/common';
import type { GpxReader, GpxReaderOptions } from '../gpx-codec.interface';
import { GpxParseError, MalformedXmlError, UnsupportedVersionError } from '../gpx.errors';
import { GpxVersion, isGpxVersion, versionFromNamespace } from '../gpx-version';
import { createGpx, type Gpx } from '../model/gpx.types';
import { attributeValue, type StartElement } from '../xml/xml-event';
import { XmlEventReader } from '../xml/xml-event-reader';
import { parseGpx } from './gpx.parser';

const DECLARED_ENCODING = /^\uFEFF?<\?xml\s[^>]*?\bencoding\s*=\s*["']([^"']*)["']/;
const UTF8_COMPATIBLE = /^(utf-?8|us-ascii)$/i;

function decode(input: string | Uint8Array): string {
  if (typeof input === 'string') {
    return input;
  }

  const text = Buffer.from(input).toString('utf8');
  const encoding = DECLARED_ENCODING.exec(text)?.[1];
  if (encoding !== undefined && !UTF8_COMPATIBLE.test(encoding)) {
    throw new MalformedXmlError(`unsupported encoding '${encoding}', expected UTF-8`);
  }
  return text;
}

export class XmlGpxReader implements GpxReader {
  private readonly logger = new Logger(XmlGpxReader.name);

  constructor(private readonly options: GpxReaderOptions = {}) {}

  read(input: string | Uint8Array): Gpx {
    const source = decode(input).replace(/^\uFEFF/, '');

    const events = new XmlEventReader(source);
    const root = events.next();
    if (!root || root.type !== 'start') {
      throw new MalformedXmlError('document has no root element');
    }
    if (root.name.local !== 'gpx') {
      throw new GpxParseError(`expected root element 'gpx', found '${root.name.local}'`);
    }

    const version = this.resolveVersion(root);
    const gpx = createGpx(version);
    const creator = attributeValue(root, 'creator');
    if (creator !== undefined) {
      gpx.creator = creator;
    }

    parseGpx({ events, version, namespace: root.name.namespace, logger: this.logger }, root, gpx);

    this.logger.debug(
      `Parsed GPX ${version}: ${gpx.waypoints.length} waypoints, ${gpx.routes.length} routes, ${gpx.tracks.length} tracks`,
    );
    return gpx;
  }

  private resolveVersion(root: StartElement): GpxVersion {
    const fallback = this.options.fallbackVersion ?? GpxVersion.Gpx11;
    const declared = attributeValue(root, 'version');

    if (declared === undefined) {
      return versionFromNamespace(root.name.namespace) ?? fallback;
    }

    const version = declared.trim();
    if (isGpxVersion(version)) {
      return version;
    }

    if (this.options.unknownVersion === 'reject') {
      throw new UnsupportedVersionError(declared);
    }

    this.logger.warn(`Unknown GPX version '${declared}', reading it as ${fallback}`);
    return fallback;
  }
}

export function readGpx(input: string | Uint8Array, options?: GpxReaderOptions): Gpx {
  return new XmlGpxReader(options).read(input);
}
