import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GatewayModule } from '../gateway/gateway.module';
import { PANORAMA_PROVIDERS } from './constants/panorama.constants';
import { PanoramaProvider } from './interfaces/panorama-provider.interface';
import { PanoramaSelectorService } from './panorama-selector.service';
import { GoogleStreetViewProvider } from './providers/google-street-view.provider';
import { MapillaryProvider } from './providers/mapillary.provider';

@Module({
  imports: [ConfigModule, GatewayModule],
  providers: [
    GoogleStreetViewProvider,
    MapillaryProvider,
    {
      provide: PANORAMA_PROVIDERS,
      inject: [GoogleStreetViewProvider, MapillaryProvider],
      useFactory: (
        google: GoogleStreetViewProvider,
        mapillary: MapillaryProvider,
      ): PanoramaProvider[] => [google, mapillary],
    },
    PanoramaSelectorService,
  ],
  exports: [PanoramaSelectorService],
})
export class PanoramaModule {}
