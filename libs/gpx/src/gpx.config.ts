import { registerAs } from '@nestjs/config';
import { GpxVersion, isGpxVersion } from './gpx-version';

export type UnknownVersionPolicy = 'fallback' | 'reject';

export interface GpxConfig {
  unknownVersion: UnknownVersionPolicy;
  fallbackVersion: GpxVersion;
  creator: string;
  indent: number;
}

export const DEFAULT_CREATOR = 'gpxkit';

export const gpxConfig = registerAs('gpx', (): GpxConfig => {
  const fallbackVersion = process.env.GPX_FALLBACK_VERSION || GpxVersion.Gpx11;

  return {
    unknownVersion: process.env.GPX_UNKNOWN_VERSION === 'reject' ? 'reject' : 'fallback',
    fallbackVersion: isGpxVersion(fallbackVersion) ? fallbackVersion : GpxVersion.Gpx11,
    creator: process.env.GPX_CREATOR || DEFAULT_CREATOR,
    indent: parseInt(process.env.GPX_INDENT || '2', 10),
  };
});
