import pino from 'pino';
import type { ILogger } from '@tessera/types';
import { env, resolveLogLevel, type LogLevel } from '../config/env.js';

/**
 * Logger utilities for the tessera engine.
 *
 * This module provides:
 * - `PinoLogger`, the `ILogger` adapter every engine service logs through
 * - `createLogger()`, a factory for configured pino instances
 * - `logger`, the module-level default used when a host supplies none
 *
 * Hosts that already own a pino instance can pass `new PinoLogger(theirPino)`
 * to `TemplateEngine` so widget telemetry lands in their existing streams.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.debug({ alias: 'form' }, 'Loaded widget library');
 */

export interface ICreateLoggerOptions {
    level?: LogLevel;

    /**
     * Route output through `pino-pretty`. Defaults to `TESSERA_LOG_PRETTY`.
     */
    pretty?: boolean;
}

/**
 * `ILogger` implementation wrapping a pino logger.
 *
 * Child loggers wrap pino children so bindings accumulate the same way they
 * do in pino itself.
 */
export class PinoLogger implements ILogger {
    constructor(private readonly pino: pino.Logger) {}

    public get level(): string {
        return this.pino.level;
    }

    public fatal(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.fatal(objOrMessage);
        } else {
            this.pino.fatal(objOrMessage, message);
        }
    }

    public error(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.error(objOrMessage);
        } else {
            this.pino.error(objOrMessage, message);
        }
    }

    public warn(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.warn(objOrMessage);
        } else {
            this.pino.warn(objOrMessage, message);
        }
    }

    public info(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.info(objOrMessage);
        } else {
            this.pino.info(objOrMessage, message);
        }
    }

    public debug(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.debug(objOrMessage);
        } else {
            this.pino.debug(objOrMessage, message);
        }
    }

    public trace(objOrMessage: Record<string, unknown> | string, message?: string): void {
        if (typeof objOrMessage === 'string') {
            this.pino.trace(objOrMessage);
        } else {
            this.pino.trace(objOrMessage, message);
        }
    }

    public child(bindings: Record<string, unknown>): PinoLogger {
        return new PinoLogger(this.pino.child(bindings));
    }
}

/**
 * Creates a pino logger with the standard tessera configuration.
 *
 * Plain JSON lines on stdout by default. With `pretty` the output goes through
 * the `pino-pretty` transport, which runs in a worker thread, so it is meant
 * for local development rather than tests.
 *
 * @returns Configured logger wrapped in the `ILogger` adapter
 */
export function createLogger(options: ICreateLoggerOptions = {}): PinoLogger {
    const level = options.level ?? resolveLogLevel();
    const pretty = options.pretty ?? env.TESSERA_LOG_PRETTY;

    const base = {
        level,
        base: {
            service: 'tessera'
        }
    };

    if (!pretty) {
        return new PinoLogger(pino(base));
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return new PinoLogger(pino(base, transport));
}

/**
 * Default engine logger.
 *
 * Silent under `NODE_ENV=test` unless `TESSERA_LOG_LEVEL` says otherwise.
 */
export const logger: PinoLogger = createLogger();
