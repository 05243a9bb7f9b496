import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at CLI startup via `initLogger()`.
 * Modules call `getLogger()` at use time, so a logger configured after
 * import is still picked up.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/** CARDLINK_LOG_LEVEL when it names a known level; anything else is ignored here and rejected by config */
function envLogLevel(): LogLevel | undefined {
    const value = process.env['CARDLINK_LOG_LEVEL'];
    return LOG_LEVELS.find((level) => level === value);
}

/**
 * Initialize the logger. Human-readable output through pino-pretty unless
 * `jsonLogs` is set.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    loggerInstance = jsonLogs
        ? pino({ level, base: { app: 'cardlink' } })
        : pino({
              level,
              transport: {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'HH:MM:ss',
                      ignore: 'pid,hostname',
                  },
              },
          });

    return loggerInstance;
}

/**
 * Get the logger instance, optionally bound to a component name.
 *
 * Before `initLogger()` runs this is a plain JSON logger whose level comes
 * from CARDLINK_LOG_LEVEL; under Vitest it stays silent.
 */
export function getLogger(component?: string): pino.Logger {
    if (!loggerInstance) {
        const fallback = process.env['VITEST'] ? 'silent' : 'info';
        loggerInstance = pino({ level: envLogLevel() ?? fallback });
    }
    return component ? loggerInstance.child({ component }) : loggerInstance;
}
