import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type { BearingMethod } from '../utils/angle.util';
import type { PanoramaProviderId } from '../../integrations/panorama/constants/panorama.constants';

export class EstimatedPointDto {
  @ApiProperty({ example: 40.41695 })
  lat!: number;

  @ApiProperty({ example: -3.70365 })
  lon!: number;

  @ApiProperty({ description: 'Bearing from the camera, [0, 360)', example: 47.8 })
  bearing_deg!: number;
}

export class AddressInfoDto {
  @ApiPropertyOptional({
    description: 'Nearest feature; null when the lookup failed',
    nullable: true,
    type: String,
  })
  display_name!: string | null;

  @ApiProperty({
    description: 'Address components, or an `error` entry on failure',
    type: 'object',
    additionalProperties: { type: 'string' },
  })
  components!: Record<string, string>;
}

export class PanoramaInfoDto {
  @ApiPropertyOptional({ enum: ['google', 'mapillary'], nullable: true })
  provider!: PanoramaProviderId | null;

  @ApiProperty({
    description: 'Raw record of the chosen provider',
    type: 'object',
    additionalProperties: true,
  })
  meta!: Record<string, unknown>;

  @ApiPropertyOptional({ nullable: true, type: String })
  thumbnail_url!: string | null;
}

export class DebugInfoDto {
  @ApiProperty({ enum: ['intrinsics', 'hfov'] })
  method!: BearingMethod;

  @ApiProperty({ description: 'Offset from the camera heading, (-180, 180]' })
  delta_yaw_deg!: number;

  @ApiProperty({ example: 20 })
  assumed_distance_m!: number;

  @ApiProperty({ type: [String] })
  notes!: string[];
}

export class EstimateResponseDto {
  @ApiProperty({ type: EstimatedPointDto })
  estimated_point!: EstimatedPointDto;

  @ApiProperty({ type: AddressInfoDto })
  address!: AddressInfoDto;

  @ApiProperty({ type: PanoramaInfoDto })
  panorama!: PanoramaInfoDto;

  @ApiProperty({ type: DebugInfoDto })
  debug!: DebugInfoDto;
}

export class BearingResponseDto {
  @ApiProperty({ example: 47.8 })
  bearing_deg!: number;
}
