import { IsString, IsNotEmpty, IsOptional, IsIn } from 'class-validator';
import { GPX_VERSIONS, type GpxVersion } from '@gpxkit/gpx';

export class ConvertGpxDto {
  @IsString()
  @IsNotEmpty()
  gpxContent!: string;

  /** Target version; the source document's own when omitted. */
  @IsOptional()
  @IsIn(GPX_VERSIONS)
  version?: GpxVersion;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  creator?: string;
}
