import { Module } from '@nestjs/common';
import { GpxModule as GpxLibModule } from '@gpxkit/gpx';
import { GpxService } from './gpx.service';
import { GpxController } from './gpx.controller';

@Module({
  imports: [GpxLibModule.forRoot()],
  controllers: [GpxController],
  providers: [GpxService],
  exports: [GpxService],
})
export class GpxModule {}
