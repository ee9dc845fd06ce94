import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { HttpGatewayService } from './http-gateway.service';
import { RateLimiterService } from './rate-limiter.service';

@Module({
  imports: [
    ConfigModule,
    HttpModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        timeout: parseInt(config.get<string>('HTTP_TIMEOUT_MS') || '2500', 10),
        maxRedirects: 5,
      }),
    }),
  ],
  providers: [RateLimiterService, HttpGatewayService],
  exports: [RateLimiterService, HttpGatewayService],
})
export class GatewayModule {}
