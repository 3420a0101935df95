import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
    /** Returns a logger that prefixes every line with the given fields. */
    child(bindings: LogFields): Logger;
}

const levelOrder: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const levelStyle: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.blue,
    warn: chalk.yellow,
    error: chalk.red,
};

function formatFields(fields: LogFields): string {
    const parts = Object.entries(fields)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
    return parts.length > 0 ? ` ${chalk.gray(parts.join(' '))}` : '';
}

export interface ConsoleLoggerOptions {
    level?: LogLevel;
    bindings?: LogFields;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const threshold = levelOrder[options.level ?? 'info'];
    const bindings = options.bindings ?? {};

    const write = (level: LogLevel, message: string, fields?: LogFields): void => {
        if (levelOrder[level] < threshold) {
            return;
        }
        const line = `${levelStyle[level](level.toUpperCase().padEnd(5))} ${message}${formatFields({ ...bindings, ...fields })}`;
        if (level === 'error' || level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    };

    return {
        debug: (message, fields) => write('debug', message, fields),
        info: (message, fields) => write('info', message, fields),
        warn: (message, fields) => write('warn', message, fields),
        error: (message, fields) => write('error', message, fields),
        child: (extra) => createConsoleLogger({ level: options.level, bindings: { ...bindings, ...extra } }),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => silentLogger,
};
