import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';
import { LOGGING_DEFAULTS, type LogLevel, type Logger, type LoggingConfig } from '@forkline/core';

export interface PinoLoggerOptions extends Partial<LoggingConfig> {
    /** Fields bound to every line, e.g. the flow name. */
    bindings?: Record<string, unknown>;
    /** Writes JSON lines here instead of stdout; pretty-printing is ignored. */
    destination?: DestinationStream;
}

function createInstance(options: PinoLoggerOptions): PinoInstance {
    const { level = LOGGING_DEFAULTS.LEVEL, prettyPrint = LOGGING_DEFAULTS.PRETTY_PRINT, name, bindings, destination } = options;

    const pinoOptions: pino.LoggerOptions = { level };
    if (name) {
        pinoOptions.name = name;
    }
    if (bindings) {
        pinoOptions.base = { ...bindings };
    }

    if (destination) {
        return pino(pinoOptions, destination);
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
    }

    return pino(pinoOptions);
}

/**
 * `Logger` port backed by pino. Children share the parent's destination.
 */
export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    public constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = isPinoInstance(options) ? options : createInstance(options);
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }

    private write(level: LogLevel, arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[level](arg1);
        } else {
            this.pino[level](arg1, arg2);
        }
    }
}

function isPinoInstance(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
    return 'child' in value && typeof value.child === 'function';
}
