import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module';
import { HttpClientService } from './http/http-client.service';
import { PinoLoggerService } from './logging/pino-logger.service';

/**
 * Shared Module
 * Cross-cutting services: structured logging and the pooled HTTP client
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [PinoLoggerService, HttpClientService],
  exports: [PinoLoggerService, HttpClientService],
})
export class SharedModule {}
