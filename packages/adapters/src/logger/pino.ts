import { type Logger, type LogLevel } from '@kernelkit/core';
import pino, { type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /**
     * Where log lines go. Kernels default to stderr: the host owns the
     * kernel's stdout.
     */
    destination?: 'stdout' | 'stderr';
}

const FD = { stdout: 1, stderr: 2 } as const;

function createPino(options: PinoLoggerOptions): PinoInstance {
    const { level = 'info', prettyPrint = false, name, destination = 'stderr' } = options;

    const pinoOptions: pino.LoggerOptions = {
        level
    };

    if (name) {
        pinoOptions.name = name;
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
                destination: FD[destination]
            }
        };
        return pino(pinoOptions);
    }

    return pino(pinoOptions, pino.destination(FD[destination]));
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = isPinoInstance(options) ? options : createPino(options);
    }

    public get level(): string {
        return this.pino.level;
    }

    public setLevel(level: LogLevel): void {
        this.pino.level = level;
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.trace(arg1);
        } else {
            this.pino.trace(arg1, arg2);
        }
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.debug(arg1);
        } else {
            this.pino.debug(arg1, arg2);
        }
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.info(arg1);
        } else {
            this.pino.info(arg1, arg2);
        }
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.warn(arg1);
        } else {
            this.pino.warn(arg1, arg2);
        }
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.error(arg1);
        } else {
            this.pino.error(arg1, arg2);
        }
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino.fatal(arg1);
        } else {
            this.pino.fatal(arg1, arg2);
        }
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }
}

function isPinoInstance(value: PinoLoggerOptions | PinoInstance): value is PinoInstance {
    return 'child' in value && typeof value.child === 'function';
}
