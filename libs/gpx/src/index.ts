export * from './model/gpx.types';
export * from './model/xml-node';
export * from './gpx-version';
export * from './gpx-schema';
export * from './gpx.errors';
export * from './gpx.config';
export * from './gpx-codec.interface';
export * from './xml/xml-sink';
export * from './xml/xml-emitter';
export { XmlGpxReader, readGpx } from './parser/gpx.reader';
export { XmlGpxWriter, writeGpx, writeGpxToString } from './writer/gpx.writer';
export * from './gpx.module';
