// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

const loggerMap: Record<string, ILogger> = {};

/** Messages kept per level; older ones are dropped first. */
export const MAX_RETAINED_MESSAGES = 100;

function retain(messages: string[], message: string): void {
    messages.push(message);
    if (messages.length > MAX_RETAINED_MESSAGES) {
        messages.splice(0, messages.length - MAX_RETAINED_MESSAGES);
    }
}

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing coloured, level-tagged lines to a log facility.
 * The most recent messages are also kept per level so callers and tests can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.logger.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
        retain(this.infoMessages, message);
    }

    success(message: string) {
        this.logger.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
        retain(this.successMessages, message);
    }

    warn(message: string) {
        this.logger.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        retain(this.warnMessages, message);
    }

    error(message: string) {
        this.logger.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        retain(this.errorMessages, message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.logger.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        retain(this.debugMessages, message);
    }
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one.
 *
 * @param name - The name identifier for the logger.
 * @param logFacility - Where the formatted lines are sent.
 * @param verbose - Whether debug lines are written to the facility.
 * @return The logger instance associated with the provided name.
 */
export function getLogger(
    name: string,
    logFacility: ILogFacility = console,
    verbose: boolean = false,
): ILogger {
    const existing = loggerMap[name];
    if (existing) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}
