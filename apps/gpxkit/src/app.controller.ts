import { Controller, Get } from '@nestjs/common';
import { GPX_VERSIONS } from '@gpxkit/gpx';

@Controller()
export class AppController {
  @Get()
  health() {
    return {
      status: 'ok',
      service: 'gpxkit',
      gpxVersions: GPX_VERSIONS,
      timestamp: new Date().toISOString(),
    };
  }
}
