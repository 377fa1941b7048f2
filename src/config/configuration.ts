/**
 * Application Configuration
 *
 * Loads and validates environment variables, providing type-safe access to
 * the endpoints and tuning knobs of the fetcher. Command line flags cover the
 * per-run choices (taxids, modes, work directory); everything here is
 * deployment-level and rarely changes.
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const host = this.configService.get('ftp.host', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  discovery: {
    url: string;
    timeoutMs: number;
  };
  /**
   * Archive server.
   *
   * ### keepAliveIntervalMs (Environment: FTP_KEEPALIVE_INTERVAL_MS)
   * - Period of the NOOP sent on the control connection while a file is
   *   transferred on the data connection
   * - Must stay below the server's idle timeout for the control connection
   *
   * ### timeoutMs (Environment: FTP_TIMEOUT_MS)
   * - Bound on the connect/login handshake and on data connection inactivity
   */
  ftp: {
    host: string;
    port: number;
    baseDir: string;
    timeoutMs: number;
    keepAliveIntervalMs: number;
    archiveSuffix: string;
  };
  retry: {
    /** Delay before each attempt; the number of entries is the number of attempts */
    scheduleSeconds: number[];
  };
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    discovery: {
      url: env.WGS_DISCOVERY_URL,
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    ftp: {
      host: env.FTP_HOST,
      port: env.FTP_PORT,
      baseDir: env.FTP_BASE_DIR,
      timeoutMs: env.FTP_TIMEOUT_MS,
      keepAliveIntervalMs: env.FTP_KEEPALIVE_INTERVAL_MS,
      archiveSuffix: env.ARCHIVE_SUFFIX,
    },
    retry: {
      scheduleSeconds: env.RETRY_SCHEDULE_SECONDS,
    },
  };
};
