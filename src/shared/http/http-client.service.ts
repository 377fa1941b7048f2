import { Inject, Injectable, OnModuleDestroy, Optional } from '@nestjs/common';
import { Dispatcher, Pool } from 'undici';
import { PinoLoggerService } from '../logging/pino-logger.service';

/** Replaces the per-origin pools, e.g. with a MockAgent in tests */
export const HTTP_DISPATCHER = 'HttpDispatcher';

export interface HttpRequestOptions {
  query?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

@Injectable()
export class HttpClientService implements OnModuleDestroy {
  private readonly pools: Map<string, Pool> = new Map();
  private readonly defaultTimeout = 30000;

  private readonly logger: PinoLoggerService;

  constructor(
    logger: PinoLoggerService,
    @Optional() @Inject(HTTP_DISPATCHER) private readonly dispatcher?: Dispatcher,
  ) {
    this.logger = logger.forContext(HttpClientService.name);
  }

  private getDispatcher(origin: string): Dispatcher {
    if (this.dispatcher) return this.dispatcher;

    let pool = this.pools.get(origin);
    if (!pool) {
      pool = new Pool(origin, {
        connections: 2,
        pipelining: 1,
        keepAliveTimeout: 30000,
        keepAliveMaxTimeout: 60000,
      });
      this.pools.set(origin, pool);
    }
    return pool;
  }

  /**
   * GET a URL and read the whole body as text. HTTP error statuses are
   * returned to the caller as they are; network failures are logged and
   * rethrown, retrying is up to the caller.
   */
  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const parsedUrl = new URL(url);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      parsedUrl.searchParams.set(key, value);
    }
    const origin = parsedUrl.origin;
    const timeout = options.timeout ?? this.defaultTimeout;

    try {
      const response = await this.getDispatcher(origin).request({
        origin,
        path: parsedUrl.pathname + parsedUrl.search,
        method: 'GET',
        signal: options.signal,
        headersTimeout: timeout,
        bodyTimeout: timeout,
      });

      const body = await response.body.text();
      this.logger.debug(
        { url: `${origin}${parsedUrl.pathname}`, statusCode: response.statusCode, bytes: body.length },
        'HTTP response received',
      );

      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body,
      };
    } catch (error) {
      this.logger.warn(
        { url: `${origin}${parsedUrl.pathname}`, error: error instanceof Error ? error.message : String(error) },
        'HTTP request failed',
      );
      throw error;
    }
  }

  async destroy(): Promise<void> {
    const closePromises = Array.from(this.pools.values()).map((pool) => pool.close());
    await Promise.all(closePromises);
    this.pools.clear();
  }

  async onModuleDestroy(): Promise<void> {
    await this.destroy();
  }
}
