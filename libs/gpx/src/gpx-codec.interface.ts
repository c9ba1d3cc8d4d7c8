import type { UnknownVersionPolicy } from './gpx.config';
import type { GpxVersion } from './gpx-version';
import type { Gpx } from './model/gpx.types';
import type { XmlSink } from './xml/xml-sink';

export interface GpxReaderOptions {
  /** What to do with a `version` attribute other than 1.0 or 1.1. */
  unknownVersion?: UnknownVersionPolicy;
  /** Version used when the root declares none, or an unknown one under `fallback`. */
  fallbackVersion?: GpxVersion;
}

export interface GpxWriterOptions {
  /** Creator written when the document has none. */
  creator?: string;
  indent?: number;
}

export interface WriteOptions {
  /** Target version; defaults to the document's own. */
  version?: GpxVersion;
}

export interface GpxReader {
  /**
   * Bytes are decoded as UTF-8. A declaration naming any other encoding is
   * rejected; decode such input to a string first.
   */
  read(input: string | Uint8Array): Gpx;
}

export interface GpxWriter {
  write(gpx: Gpx, sink: XmlSink, options?: WriteOptions): void;
  writeToString(gpx: Gpx, options?: WriteOptions): string;
}

export const GPX_READER = Symbol('GPX_READER');
export const GPX_WRITER = Symbol('GPX_WRITER');
