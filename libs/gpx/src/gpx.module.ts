import { DynamicModule, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GPX_READER, GPX_WRITER } from './gpx-codec.interface';
import { DEFAULT_CREATOR, type UnknownVersionPolicy } from './gpx.config';
import { GpxVersion } from './gpx-version';
import { XmlGpxReader } from './parser/gpx.reader';
import { XmlGpxWriter } from './writer/gpx.writer';

@Module({})
export class GpxModule {
  static forRoot(): DynamicModule {
    return {
      module: GpxModule,
      providers: [
        {
          provide: GPX_READER,
          useFactory: (configService: ConfigService) =>
            new XmlGpxReader({
              unknownVersion: configService.get<UnknownVersionPolicy>('gpx.unknownVersion', 'fallback'),
              fallbackVersion: configService.get<GpxVersion>('gpx.fallbackVersion', GpxVersion.Gpx11),
            }),
          inject: [ConfigService],
        },
        {
          provide: GPX_WRITER,
          useFactory: (configService: ConfigService) =>
            new XmlGpxWriter({
              creator: configService.get<string>('gpx.creator', DEFAULT_CREATOR),
              indent: configService.get<number>('gpx.indent', 2),
            }),
          inject: [ConfigService],
        },
      ],
      exports: [GPX_READER, GPX_WRITER],
    };
  }
}
