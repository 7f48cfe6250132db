/**
 * Lift plan logger
 *
 * Namespaced logging shared by the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (import, expand, render, export, cli, ...)
 * - Optional ISO timestamps
 * - Configuration from the environment (LIFTPLAN_LOG_LEVEL, LIFTPLAN_LOG_MODULES)
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@liftplan/engine/util/logger';
 *
 * const log = createLogger('import');
 *
 * log.debug('Reading tie-up', file);
 * log.info({ picks: 48, sections: 3 });
 * log.warn('Treadle 9 is not tied to any shaft');
 * log.error('Failed to read file', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: false,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(level => level === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({ level: 'debug', modules: ['expand', 'export'] });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('debug')) {
    console.log('[liftplan] Logging configured:', config);
  }
}

/**
 * Load logging configuration from environment variables.
 * Reads LIFTPLAN_LOG_LEVEL (none|error|warn|info|debug) and
 * LIFTPLAN_LOG_MODULES (comma-separated module names). Unknown levels are ignored.
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const levelStr = env.LIFTPLAN_LOG_LEVEL?.trim().toLowerCase();
  const level = levelStr && isLogLevel(levelStr) ? levelStr : undefined;
  const modulesStr = env.LIFTPLAN_LOG_MODULES;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (level || modules) {
    configureLogging({ level: level ?? config.level, modules });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

/** Restore defaults. Mostly useful between tests. */
export function resetLogging(): void {
  config = { level: 'error', modules: undefined, timestamps: false };
  moduleSet.clear();
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function output(level: Exclude<LogLevel, 'none'>, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  switch (level) {
    case 'error': console.error(prefix, ...args); break;
    case 'warn': console.warn(prefix, ...args); break;
    case 'info': console.info(prefix, ...args); break;
    case 'debug': console.log(prefix, ...args); break;
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'import', 'expand', 'export', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) output('error', module, args);
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) output('warn', module, args);
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) output('info', module, args);
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) output('debug', module, args);
    },
  };
}

export default createLogger;
