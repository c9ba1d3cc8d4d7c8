import { GpxVersion, GPX_VERSIONS } from './gpx-version';

/**
 * Element contexts of the GPX document. `waypoint` covers `wpt`, `rtept` and
 * `trkpt`, which share one schema type.
 */
export type GpxElement =
  | 'gpx'
  | 'metadata'
  | 'waypoint'
  | 'route'
  | 'track'
  | 'trackSegment'
  | 'link'
  | 'person'
  | 'copyright'
  | 'bounds'
  | 'email';

export type ChildRule =
  | { kind: 'text'; tag: string; versions: readonly GpxVersion[] }
  | {
      kind: 'element';
      tag: string;
      element: GpxElement;
      repeated: boolean;
      versions: readonly GpxVersion[];
    };

export interface ElementSchema {
  /** Children in the canonical (XSD sequence) order writers emit them in. */
  children: readonly ChildRule[];
  /** Whether an `<extensions>` block has a place to be stored. */
  extensions: boolean;
}

export type ChildAction =
  | { action: 'text'; rule: Extract<ChildRule, { kind: 'text' }> }
  | { action: 'element'; rule: Extract<ChildRule, { kind: 'element' }> }
  | { action: 'extensions' }
  | { action: 'reject' };

export const EXTENSIONS_TAG = 'extensions';

const ALL = GPX_VERSIONS;
const V10: readonly GpxVersion[] = [GpxVersion.Gpx10];
const V11: readonly GpxVersion[] = [GpxVersion.Gpx11];

const text = (tag: string, versions = ALL): ChildRule => ({ kind: 'text', tag, versions });

const one = (tag: string, element: GpxElement, versions = ALL): ChildRule => ({
  kind: 'element',
  tag,
  element,
  repeated: false,
  versions,
});

const many = (tag: string, element: GpxElement, versions = ALL): ChildRule => ({
  kind: 'element',
  tag,
  element,
  repeated: true,
  versions,
});

const DESCRIPTIVE: readonly ChildRule[] = [
  text('name'),
  text('cmt'),
  text('desc'),
  text('src'),
  text('url', V10),
  text('urlname', V10),
  many('link', 'link', V11),
  text('number'),
  text('type', V11),
];

export const GPX_SCHEMA: Record<GpxElement, ElementSchema> = {
  gpx: {
    children: [
      // GPX 1.0 keeps document metadata directly under the root.
      text('name', V10),
      text('desc', V10),
      text('author', V10),
      text('email', V10),
      text('url', V10),
      text('urlname', V10),
      text('time', V10),
      text('keywords', V10),
      one('bounds', 'bounds', V10),
      one('metadata', 'metadata', V11),
      many('wpt', 'waypoint'),
      many('rte', 'route'),
      many('trk', 'track'),
    ],
    extensions: true,
  },
  metadata: {
    children: [
      text('name', V11),
      text('desc', V11),
      one('author', 'person', V11),
      one('copyright', 'copyright', V11),
      many('link', 'link', V11),
      text('time', V11),
      text('keywords', V11),
      one('bounds', 'bounds', V11),
    ],
    extensions: true,
  },
  waypoint: {
    children: [
      text('ele'),
      text('time'),
      text('course', V10),
      text('speed', V10),
      text('magvar'),
      text('geoidheight'),
      text('name'),
      text('cmt'),
      text('desc'),
      text('src'),
      text('url', V10),
      text('urlname', V10),
      many('link', 'link', V11),
      text('sym'),
      text('type'),
      text('fix'),
      text('sat'),
      text('hdop'),
      text('vdop'),
      text('pdop'),
      text('ageofdgpsdata'),
      text('dgpsid'),
    ],
    extensions: true,
  },
  route: {
    children: [...DESCRIPTIVE, many('rtept', 'waypoint')],
    extensions: true,
  },
  track: {
    children: [...DESCRIPTIVE, many('trkseg', 'trackSegment')],
    extensions: true,
  },
  trackSegment: {
    children: [many('trkpt', 'waypoint')],
    extensions: true,
  },
  link: {
    children: [text('text', V11), text('type', V11)],
    extensions: false,
  },
  person: {
    children: [text('name', V11), one('email', 'email', V11), one('link', 'link', V11)],
    extensions: false,
  },
  copyright: {
    children: [text('year', V11), text('license', V11)],
    extensions: false,
  },
  bounds: { children: [], extensions: false },
  email: { children: [], extensions: false },
};

export function allowedChildren(version: GpxVersion, element: GpxElement): ChildRule[] {
  return GPX_SCHEMA[element].children.filter((rule) => rule.versions.includes(version));
}

export function resolveChild(version: GpxVersion, parent: GpxElement, tag: string): ChildAction {
  if (tag === EXTENSIONS_TAG) {
    return { action: 'extensions' };
  }

  const rule = GPX_SCHEMA[parent].children.find(
    (candidate) => candidate.tag === tag && candidate.versions.includes(version),
  );

  if (!rule) {
    return { action: 'reject' };
  }

  return rule.kind === 'text' ? { action: 'text', rule } : { action: 'element', rule };
}
