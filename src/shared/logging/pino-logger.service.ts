import { Inject, Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pino, { type Logger } from 'pino';
import { AppConfig } from '../../config/configuration';

/** Optional pre-built pino instance; children are created through it */
export const PINO_INSTANCE = 'PinoInstance';

@Injectable()
export class PinoLoggerService implements LoggerService {
  private readonly logger: Logger;
  private context?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    @Optional() @Inject(PINO_INSTANCE) instance?: Logger,
  ) {
    this.logger = instance ?? this.createRoot();
  }

  private createRoot(): Logger {
    const logLevel = this.configService.get('logLevel', { infer: true }) || 'info';
    const nodeEnv = this.configService.get('nodeEnv', { infer: true });

    return pino({
      level: logLevel,
      ...(nodeEnv === 'development' && {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,service,env',
          },
        },
      }),
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: {
        service: 'wgs-taxon-fetch',
        env: nodeEnv,
      },
    });
  }

  setContext(context: string): void {
    this.context = context;
  }

  private formatMessage(
    message: string,
    context?: string,
  ): { msg: string; context?: string } {
    return {
      msg: message,
      context: context || this.context,
    };
  }

  log(message: string, context?: string): void {
    this.logger.info(this.formatMessage(message, context));
  }

  info(message: string): void;
  info(obj: Record<string, unknown>, message: string): void;
  info(objOrMessage: Record<string, unknown> | string, message?: string): void {
    if (typeof objOrMessage === 'string') {
      this.logger.info(this.formatMessage(objOrMessage));
    } else {
      this.logger.info({ ...objOrMessage, context: this.context }, message || '');
    }
  }

  error(
    message: string | Record<string, unknown>,
    trace?: string,
    context?: string,
  ): void {
    if (typeof message === 'object') {
      this.logger.error({ ...message, context: this.context }, trace || '');
    } else {
      this.logger.error({ trace, ...this.formatMessage(message, context) });
    }
  }

  warn(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.warn({ ...message, context: this.context }, context || '');
    } else {
      this.logger.warn(this.formatMessage(message, context));
    }
  }

  debug(message: string | Record<string, unknown>, context?: string): void {
    if (typeof message === 'object') {
      this.logger.debug({ ...message, context: this.context }, context || '');
    } else {
      this.logger.debug(this.formatMessage(message, context));
    }
  }

  verbose(message: string, context?: string): void {
    this.logger.trace(this.formatMessage(message, context));
  }

  child(bindings: Record<string, unknown>): PinoLoggerService {
    const childLogger = new PinoLoggerService(this.configService, this.logger.child(bindings));
    if (this.context) childLogger.setContext(this.context);
    return childLogger;
  }

  /** Child logger with its own context, leaving this one untouched */
  forContext(context: string): PinoLoggerService {
    const childLogger = this.child({});
    childLogger.setContext(context);
    return childLogger;
  }

  withRunId(runId: string): PinoLoggerService {
    return this.child({ runId });
  }

  withCollectionId(collectionId: string): PinoLoggerService {
    return this.child({ collectionId });
  }
}
