// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger, LogLevel } from '../../@types/index.js';

import chalk, { type ChalkInstance } from 'chalk';

interface ILevelStyle {
    label: string;
    colour: ChalkInstance;
    channel: keyof ILogFacility;
}

const LEVEL_STYLES: Record<LogLevel, ILevelStyle> = {
    info: { label: 'INFO', colour: chalk.blue, channel: 'log' },
    success: { label: 'SUCCESS', colour: chalk.green, channel: 'log' },
    warn: { label: 'WARNING', colour: chalk.yellow, channel: 'warn' },
    error: { label: 'ERROR', colour: chalk.red, channel: 'error' },
    debug: { label: 'DEBUG', colour: chalk.magenta, channel: 'log' },
};

const loggers = new Map<string, Logger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing coloured, level-prefixed lines to a log facility. The
 * plain messages of every line written are kept per level.
 */
class Logger implements ILogger {
    readonly messages: Record<LogLevel, string[]> = { info: [], success: [], warn: [], error: [], debug: [] };

    constructor(
        readonly name: string,
        public facility: ILogFacility,
        public verbose: boolean,
    ) {}

    info(message: string): void {
        this.write('info', message);
    }

    success(message: string): void {
        this.write('success', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string): void {
        this.write('error', message);
    }

    debug(message: string): void {
        if (this.verbose) this.write('debug', message);
    }

    private write(level: LogLevel, message: string): void {
        const { label, colour, channel } = LEVEL_STYLES[level];
        this.facility[channel](colour(`[${label}] ${this.name} :: ${message}`));
        this.messages[level].push(message);
    }
}

/**
 * Returns the logger registered under `name`, creating it on first use.
 * Passing a facility or a verbosity reconfigures an existing logger, so the
 * CLI's global flags reach loggers the engines created earlier.
 *
 * @param name - Component name printed on every line.
 * @param logFacility - Where lines go; the console for a new logger.
 * @param verbose - Whether debug lines are written; off for a new logger.
 */
export function getLogger(name: string, logFacility?: ILogFacility, verbose?: boolean): ILogger {
    let logger = loggers.get(name);
    if (!logger) {
        logger = new Logger(name, logFacility ?? console, verbose ?? false);
        loggers.set(name, logger);
        return logger;
    }
    if (logFacility) logger.facility = logFacility;
    if (verbose !== undefined) logger.verbose = verbose;
    return logger;
}
