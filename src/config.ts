export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface ClientConfig {
  /** Page size requested per transport call while paginating. */
  containerSize?: number;
  /** Reload partial objects when an absent field is read. */
  autoReload?: boolean;
  /** Field names that never trigger an auto-reload. */
  dontReloadFor?: readonly string[];
  logLevel?: LogLevel;
}

/** Internal: config with environment and defaults applied */
export interface ResolvedConfig {
  containerSize: number;
  autoReload: boolean;
  dontReloadFor: ReadonlySet<string>;
  logLevel: LogLevel;
}

export const DEFAULT_CONTAINER_SIZE = 100;

const ENV_PREFIX = 'MEDIA_GRAPH_';

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw.split(',').map((s) => s.trim()).filter((s) => s !== '');
}

function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (level === undefined) {
    throw new Error(`${ENV_PREFIX}LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

function parseContainerSize(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

/**
 * Applies, in order of precedence, explicit options, `MEDIA_GRAPH_*`
 * environment variables and defaults.
 */
export function resolveConfig(config: ClientConfig = {}, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const containerSize = config.containerSize
    ?? parseContainerSize(env[`${ENV_PREFIX}CONTAINER_SIZE`])
    ?? DEFAULT_CONTAINER_SIZE;
  if (!Number.isInteger(containerSize) || containerSize <= 0) {
    throw new Error(`containerSize must be a positive integer, got ${containerSize}`);
  }

  return {
    containerSize,
    autoReload: config.autoReload ?? parseBoolean(env[`${ENV_PREFIX}AUTORELOAD`]) ?? true,
    dontReloadFor: new Set(config.dontReloadFor ?? parseList(env[`${ENV_PREFIX}DONT_RELOAD_FOR`]) ?? []),
    logLevel: config.logLevel ?? parseLogLevel(env[`${ENV_PREFIX}LOG_LEVEL`]) ?? 'info',
  };
}
