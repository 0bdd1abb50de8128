// tests/helpers/mockLogger.ts

import type { ILogger, LogLevel } from '../../src/@types/index.js';

/**
 * Logger that keeps every message per level instead of printing it.
 */
export class MockLogger implements ILogger {
    readonly messages: Record<LogLevel, string[]> = { info: [], success: [], warn: [], error: [], debug: [] };

    constructor(readonly verbose: boolean = false) {}

    info(message: string): void {
        this.messages.info.push(message);
    }
    success(message: string): void {
        this.messages.success.push(message);
    }
    warn(message: string): void {
        this.messages.warn.push(message);
    }
    error(message: string): void {
        this.messages.error.push(message);
    }
    debug(message: string): void {
        if (this.verbose) this.messages.debug.push(message);
    }
}
