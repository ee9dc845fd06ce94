import {
  IsArray,
  IsDefined,
  IsIn,
  IsInt,
  IsObject,
  IsNumber,
  IsOptional,
  IsPositive,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  DEFAULT_PROVIDER_PRIORITY,
  PanoramaProviderId,
  SUPPORTED_PROVIDERS,
} from '../../integrations/panorama/constants/panorama.constants';
import {
  IsBelow,
  normalizeProviderPriority,
} from '../validators/geometry.validators';

export const GEOMETRY_SOURCE_MESSAGE =
  'Either hfov_deg or both fx and cx must be provided';

export class BoundingBoxDto {
  @ApiProperty({ description: 'Left edge in pixels', example: 860 })
  @IsNumber()
  x!: number;

  @ApiProperty({ description: 'Top edge in pixels', example: 410 })
  @IsNumber()
  y!: number;

  @ApiProperty({ description: 'Width in pixels', example: 200, exclusiveMinimum: true, minimum: 0 })
  @IsNumber()
  @IsPositive()
  w!: number;

  @ApiProperty({ description: 'Height in pixels', example: 120, exclusiveMinimum: true, minimum: 0 })
  @IsNumber()
  @IsPositive()
  h!: number;
}

export class EstimateRequestDto {
  @ApiProperty({ description: 'Image width in pixels', example: 1920 })
  @IsInt()
  @IsPositive()
  image_width!: number;

  @ApiProperty({ description: 'Image height in pixels', example: 1080 })
  @IsInt()
  @IsPositive()
  image_height!: number;

  @ApiPropertyOptional({
    description:
      'Horizontal field of view in degrees. Required unless both fx and cx are given.',
    example: 90,
    exclusiveMinimum: true,
    minimum: 0,
    exclusiveMaximum: true,
    maximum: 360,
  })
  @ValidateIf(
    (o: EstimateRequestDto) => o.hfov_deg != null || o.fx == null || o.cx == null,
  )
  @IsDefined({ message: GEOMETRY_SOURCE_MESSAGE })
  @IsNumber()
  @IsPositive()
  @IsBelow(360)
  hfov_deg?: number;

  @ApiPropertyOptional({ description: 'Focal length in pixels', example: 1400 })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  fx?: number;

  @ApiPropertyOptional({
    description: 'Vertical focal length in pixels (accepted, not used)',
  })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  fy?: number;

  @ApiPropertyOptional({ description: 'Principal point x in pixels', example: 960 })
  @IsOptional()
  @IsNumber()
  cx?: number;

  @ApiPropertyOptional({
    description: 'Principal point y in pixels (accepted, not used)',
  })
  @IsOptional()
  @IsNumber()
  cy?: number;

  @ApiProperty({ description: 'Camera latitude', example: 40.4168, minimum: -90, maximum: 90 })
  @IsNumber()
  @Min(-90)
  @Max(90)
  camera_lat!: number;

  @ApiProperty({ description: 'Camera longitude', example: -3.7038, minimum: -180, maximum: 180 })
  @IsNumber()
  @Min(-180)
  @Max(180)
  camera_lon!: number;

  @ApiProperty({
    description: 'Camera compass heading, degrees clockwise from north',
    example: 45,
  })
  @IsNumber()
  camera_heading_deg!: number;

  @ApiProperty({ type: BoundingBoxDto })
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => BoundingBoxDto)
  bbox!: BoundingBoxDto;

  @ApiPropertyOptional({
    description: 'Assumed distance to the subject in meters',
    default: 20,
    example: 15,
  })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  assumed_distance_m?: number;

  @ApiPropertyOptional({
    description:
      'Panorama providers to try, in order. Unknown names and duplicates are dropped.',
    enum: [...SUPPORTED_PROVIDERS],
    isArray: true,
    default: DEFAULT_PROVIDER_PRIORITY,
  })
  @IsOptional()
  @Transform(({ value }) => normalizeProviderPriority(value))
  @IsArray()
  @IsIn(SUPPORTED_PROVIDERS, { each: true })
  provider_priority: PanoramaProviderId[] = [...DEFAULT_PROVIDER_PRIORITY];

  @ApiPropertyOptional({
    description: 'Panorama search radius in meters',
    default: 50,
    example: 50,
  })
  @IsOptional()
  @IsNumber()
  @IsPositive()
  radius_m?: number;
}
