import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ApplicationModule } from './application/application.module';

/**
 * Root module of the command line application context (no HTTP server)
 */
@Module({
  imports: [ConfigModule, SharedModule, ApplicationModule],
})
export class AppModule {}
