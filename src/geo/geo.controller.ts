import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  GatewayTimeoutException,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  RelaxedThrottle,
  StrictThrottle,
} from '../common/decorators/throttle.decorator';
import { GeoService } from './geo.service';
import { EstimateRequestDto } from './dto/estimate-request.dto';
import {
  BearingResponseDto,
  EstimateResponseDto,
} from './dto/estimate-response.dto';
import {
  GeodesicNonConvergenceError,
  InvalidGeometryInputError,
  PipelineTimeoutError,
} from './errors/geo.errors';

@Controller('api/v1/geo')
@ApiTags('Geo')
export class GeoController {
  private readonly logger = new Logger(GeoController.name);

  constructor(private readonly geoService: GeoService) {}

  @Post('estimate')
  @HttpCode(HttpStatus.OK)
  @StrictThrottle()
  @ApiOperation({
    summary: 'Geolocate a detection',
    description:
      'Projects the bounding-box center to a geographic point and enriches it with the nearest address and a street-level panorama facing the target.',
  })
  @ApiResponse({ status: 200, type: EstimateResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid payload or no geometry source' })
  @ApiResponse({ status: 502, description: 'Internal computation failure' })
  @ApiResponse({ status: 504, description: 'Enrichment exceeded the deadline' })
  async estimate(
    @Body() request: EstimateRequestDto,
  ): Promise<EstimateResponseDto> {
    this.logger.log(
      `POST /api/v1/geo/estimate - camera: ${request.camera_lat},${request.camera_lon}, heading: ${request.camera_heading_deg}, providers: ${request.provider_priority.join('|') || 'none'}`,
    );

    try {
      return await this.geoService.runPipeline(request);
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      if (error instanceof InvalidGeometryInputError) {
        throw new BadRequestException(error.message);
      }

      if (error instanceof PipelineTimeoutError) {
        throw new GatewayTimeoutException('Pipeline timed out');
      }

      if (error instanceof GeodesicNonConvergenceError) {
        this.logger.error(error.message);
        throw new BadGatewayException(error.message);
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(
        `Estimation failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new BadGatewayException(message);
    }
  }

  @Post('bearing')
  @HttpCode(HttpStatus.OK)
  @RelaxedThrottle()
  @ApiOperation({
    summary: 'Bearing of a detection',
    description:
      'Absolute compass bearing of the bounding-box center, without projection or enrichment.',
  })
  @ApiResponse({ status: 200, type: BearingResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid payload or no geometry source' })
  computeBearing(@Body() request: EstimateRequestDto): BearingResponseDto {
    this.logger.log(
      `POST /api/v1/geo/bearing - heading: ${request.camera_heading_deg}, image_width: ${request.image_width}`,
    );

    try {
      return this.geoService.computeBearing(request);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new BadRequestException(message);
    }
  }
}
