import { Inject, Injectable, Logger } from '@nestjs/common';
import { GPX_READER, GPX_WRITER } from '@gpxkit/gpx';
import type { Gpx, GpxReader, GpxVersion, GpxWriter } from '@gpxkit/gpx';

export interface GpxSummary {
  version: GpxVersion;
  creator?: string;
  name?: string;
  waypointsCount: number;
  routesCount: number;
  tracksCount: number;
  trackPointsCount: number;
}

export interface ConvertResult {
  version: GpxVersion;
  gpx: string;
}

@Injectable()
export class GpxService {
  private readonly logger = new Logger(GpxService.name);

  constructor(
    @Inject(GPX_READER)
    private readonly gpxReader: GpxReader,
    @Inject(GPX_WRITER)
    private readonly gpxWriter: GpxWriter,
  ) {}

  parse(gpxContent: string): Gpx {
    return this.gpxReader.read(gpxContent);
  }

  summarize(gpx: Gpx): GpxSummary {
    const trackPointsCount = gpx.tracks.reduce(
      (total, track) => total + track.segments.reduce((sum, segment) => sum + segment.points.length, 0),
      0,
    );

    return {
      version: gpx.version,
      creator: gpx.creator,
      name: gpx.metadata?.name,
      waypointsCount: gpx.waypoints.length,
      routesCount: gpx.routes.length,
      tracksCount: gpx.tracks.length,
      trackPointsCount,
    };
  }

  convert(gpxContent: string, version?: GpxVersion, creator?: string): ConvertResult {
    const gpx = this.parse(gpxContent);
    if (creator !== undefined) {
      gpx.creator = creator;
    }

    const target = version ?? gpx.version;
    if (target !== gpx.version) {
      this.logger.log(`Converting GPX ${gpx.version} document to ${target}`);
    }

    return { version: target, gpx: this.gpxWriter.writeToString(gpx, { version: target }) };
  }
}
