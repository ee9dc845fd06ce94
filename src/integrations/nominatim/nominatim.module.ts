import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { GatewayModule } from '../gateway/gateway.module';
import { ReverseGeocodingService } from './reverse-geocoding.service';

@Module({
  imports: [ConfigModule, GatewayModule],
  providers: [ReverseGeocodingService],
  exports: [ReverseGeocodingService],
})
export class NominatimModule {}
