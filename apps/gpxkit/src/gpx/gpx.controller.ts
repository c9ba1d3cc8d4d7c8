import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { GpxService } from './gpx.service';
import { ParseGpxDto } from './dto/parse-gpx.dto';
import { ConvertGpxDto } from './dto/convert-gpx.dto';

@Controller('gpx')
export class GpxController {
  constructor(private readonly gpxService: GpxService) {}

  @Post('parse')
  @HttpCode(HttpStatus.OK)
  parse(@Body() dto: ParseGpxDto) {
    const document = this.gpxService.parse(dto.gpxContent);
    return {
      ...this.gpxService.summarize(document),
      document,
    };
  }

  @Post('convert')
  @HttpCode(HttpStatus.OK)
  convert(@Body() dto: ConvertGpxDto) {
    return this.gpxService.convert(dto.gpxContent, dto.version, dto.creator);
  }
}
