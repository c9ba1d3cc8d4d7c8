import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validate } from '@gpxkit/config';
import { gpxConfig } from '@gpxkit/gpx';
import { AppController } from './app.controller';
import { GpxModule } from './gpx/gpx.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [gpxConfig],
      validate,
    }),
    GpxModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
