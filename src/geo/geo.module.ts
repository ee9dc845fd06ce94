import { Module } from '@nestjs/common';
import { NominatimModule } from '../integrations/nominatim/nominatim.module';
import { PanoramaModule } from '../integrations/panorama/panorama.module';
import { GeoController } from './geo.controller';
import { GeoService } from './geo.service';

@Module({
  imports: [NominatimModule, PanoramaModule],
  controllers: [GeoController],
  providers: [GeoService],
})
export class GeoModule {}
