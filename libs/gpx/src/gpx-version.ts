export const GpxVersion = {
  Gpx10: '1.0',
  Gpx11: '1.1',
} as const;

export type GpxVersion = (typeof GpxVersion)[keyof typeof GpxVersion];

export const GPX_VERSIONS: readonly GpxVersion[] = [GpxVersion.Gpx10, GpxVersion.Gpx11];

export const GPX_NAMESPACES: Record<GpxVersion, string> = {
  '1.0': 'http://www.topografix.com/GPX/1/0',
  '1.1': 'http://www.topografix.com/GPX/1/1',
};

export const GPX_SCHEMA_LOCATIONS: Record<GpxVersion, string> = {
  '1.0': 'http://www.topografix.com/GPX/1/0 http://www.topografix.com/GPX/1/0/gpx.xsd',
  '1.1': 'http://www.topografix.com/GPX/1/1 http://www.topografix.com/GPX/1/1/gpx.xsd',
};

export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

export function isGpxVersion(value: string): value is GpxVersion {
  return value === GpxVersion.Gpx10 || value === GpxVersion.Gpx11;
}

export function versionFromNamespace(namespace: string | undefined): GpxVersion | undefined {
  if (namespace === undefined) return undefined;
  return GPX_VERSIONS.find((version) => GPX_NAMESPACES[version] === namespace);
}
