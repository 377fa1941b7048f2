import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';
import { RETRY_SCHEDULE, RETRY_SLEEPER } from './ports/tokens';
import { RetryScheduleVO } from '../domain/value-objects/retry-schedule.vo';

// Use Cases
import { RunPipelineUseCase } from './use-cases';

// Application services
import { RetryPolicyService, timerSleeper } from './services/retry-policy.service';
import { RecordNormalizerService } from './services/record-normalizer.service';

/**
 * Application Module
 * Contains the pipeline use case and the services it is built from
 *
 * This module depends on output ports (interfaces) but not on their implementations.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    {
      provide: RETRY_SCHEDULE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        RetryScheduleVO.fromSeconds(configService.get('retry.scheduleSeconds', { infer: true })),
    },
    { provide: RETRY_SLEEPER, useValue: timerSleeper },
    RetryPolicyService,
    RecordNormalizerService,

    // Use Cases
    RunPipelineUseCase,
  ],
  exports: [
    // Export the use case so the command line entry point can run it
    RunPipelineUseCase,
  ],
})
export class ApplicationModule {}
