import type { GpxVersion } from '../gpx-version';
import type { XmlNode } from './xml-node';

/**
 * Vendor content found under `<extensions>`. The node is the `<extensions>`
 * element itself; its children are kept exactly as read.
 */
export type Extensions = XmlNode;

export type FixType = 'none' | '2d' | '3d' | 'dgps' | 'pps';

export const FIX_TYPES: readonly FixType[] = ['none', '2d', '3d', 'dgps', 'pps'];

export interface Link {
  href: string;
  text?: string;
  /** Mime type of the linked content, e.g. `image/jpeg`. */
  type?: string;
}

export interface Person {
  name?: string;
  /** Stored as `id@domain`; split back into attributes when written as GPX 1.1. */
  email?: string;
  link?: Link;
}

export interface Copyright {
  author: string;
  year?: number;
  license?: string;
}

export interface Bounds {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

export interface Metadata {
  name?: string;
  description?: string;
  author?: Person;
  copyright?: Copyright;
  links: Link[];
  time?: Date;
  keywords?: string;
  bounds?: Bounds;
  extensions?: Extensions;
}

export interface Waypoint {
  lat: number;
  lon: number;
  /** Meters above mean sea level. */
  elevation?: number;
  time?: Date;
  /** GPX 1.0 only. Meters per second. */
  speed?: number;
  /** GPX 1.0 only. Degrees, true north. */
  course?: number;
  magneticVariation?: number;
  geoidHeight?: number;
  name?: string;
  comment?: string;
  description?: string;
  source?: string;
  links: Link[];
  symbol?: string;
  type?: string;
  fix?: FixType;
  satellites?: number;
  hdop?: number;
  vdop?: number;
  pdop?: number;
  /** Seconds since the last DGPS update (`ageofdgpsdata`). */
  dgpsAge?: number;
  dgpsStationId?: number;
  extensions?: Extensions;
}

export interface TrackSegment {
  points: Waypoint[];
  extensions?: Extensions;
}

export interface Track {
  name?: string;
  comment?: string;
  description?: string;
  source?: string;
  links: Link[];
  type?: string;
  number?: number;
  segments: TrackSegment[];
  extensions?: Extensions;
}

export interface Route {
  name?: string;
  comment?: string;
  description?: string;
  source?: string;
  links: Link[];
  type?: string;
  number?: number;
  points: Waypoint[];
  extensions?: Extensions;
}

export interface Gpx {
  readonly version: GpxVersion;
  creator?: string;
  metadata?: Metadata;
  waypoints: Waypoint[];
  routes: Route[];
  tracks: Track[];
  extensions?: Extensions;
}

export function createGpx(version: GpxVersion): Gpx {
  return { version, waypoints: [], routes: [], tracks: [] };
}

export function createMetadata(): Metadata {
  return { links: [] };
}

export function createWaypoint(lat: number, lon: number): Waypoint {
  return { lat, lon, links: [] };
}

export function createTrack(): Track {
  return { links: [], segments: [] };
}

export function createTrackSegment(): TrackSegment {
  return { points: [] };
}

export function createRoute(): Route {
  return { links: [], points: [] };
}

export function createLink(href: string): Link {
  return { href };
}
