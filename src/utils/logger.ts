import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at CLI startup via `initLogger()`;
 * modules take a child logger tagged with their component name.
 */
let loggerInstance: pino.Logger | null = null;

export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ name: 'citegeo', level });
    } else {
        loggerInstance = pino({
            name: 'citegeo',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default info-level logger.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}

/**
 * Child logger bound to a component, e.g. `getComponentLogger('pipeline')`.
 * Call it where the logger is used, not at module load, so `initLogger()` settings apply.
 */
export function getComponentLogger(component: string): pino.Logger {
    return getLogger().child({ component });
}
