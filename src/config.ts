/**
 * Session configuration
 *
 * Environment variables (read by loadConfigFromEnv, used by scripts):
 *   SCPI_CONNECT_TIMEOUT_MS - TCP connect timeout (default: 5000)
 *   SCPI_IO_TIMEOUT_MS - Reply timeout per query (default: 2000)
 *   SCPI_VERBOSE - Echo command traffic when "1" or "true"
 */

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface SessionConfig {
  connectTimeoutMs?: number;
  ioTimeoutMs?: number;
  /** Log every command and reply */
  verbose?: boolean;
  logger?: Logger;
}

export const DEFAULT_CONFIG: Required<SessionConfig> = {
  connectTimeoutMs: 5000,
  ioTimeoutMs: 2000,
  verbose: false,
  logger: console,
};

export function resolveConfig(config: SessionConfig = {}): Required<SessionConfig> {
  return {
    connectTimeoutMs: config.connectTimeoutMs ?? DEFAULT_CONFIG.connectTimeoutMs,
    ioTimeoutMs: config.ioTimeoutMs ?? DEFAULT_CONFIG.ioTimeoutMs,
    verbose: config.verbose ?? DEFAULT_CONFIG.verbose,
    logger: config.logger ?? DEFAULT_CONFIG.logger,
  };
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  const parsePositive = (envVar: string | undefined, defaultVal: number): number => {
    if (!envVar) return defaultVal;
    const parsed = Number.parseInt(envVar, 10);
    return Number.isNaN(parsed) || parsed <= 0 ? defaultVal : parsed;
  };

  const verbose = (env.SCPI_VERBOSE ?? '').toLowerCase();

  return {
    connectTimeoutMs: parsePositive(env.SCPI_CONNECT_TIMEOUT_MS, DEFAULT_CONFIG.connectTimeoutMs),
    ioTimeoutMs: parsePositive(env.SCPI_IO_TIMEOUT_MS, DEFAULT_CONFIG.ioTimeoutMs),
    verbose: verbose === '1' || verbose === 'true',
  };
}
