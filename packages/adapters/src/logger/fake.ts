import { type Logger, type LogLevel, LOG_LEVELS } from '@kernelkit/core';

export interface FakeLogEntry {
    level: Exclude<LogLevel, 'silent'>;
    obj?: Record<string, unknown>;
    msg?: string;
}

/**
 * In-memory logger for tests. Children share the parent's entry list and
 * record their bindings on every entry they write.
 */
export class FakeLogger implements Logger {
    public logs: FakeLogEntry[];
    public level: LogLevel = 'info';
    public readonly levelChanges: LogLevel[] = [];
    private readonly bindings: Record<string, unknown>;

    public constructor(logs: FakeLogEntry[] = [], bindings: Record<string, unknown> = {}) {
        this.logs = logs;
        this.bindings = bindings;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
        this.levelChanges.push(level);
    }

    public messages(level?: FakeLogEntry['level']): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .map((entry) => entry.msg ?? '');
    }

    private log(level: FakeLogEntry['level'], arg1: Record<string, unknown> | string, arg2?: string): void {
        if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
            return;
        }

        const hasBindings = Object.keys(this.bindings).length > 0;
        if (typeof arg1 === 'string') {
            this.logs.push(hasBindings ? { level, obj: { ...this.bindings }, msg: arg1 } : { level, msg: arg1 });
            return;
        }

        const msgProp = arg2 !== undefined ? { msg: arg2 } : {};
        this.logs.push({ level, obj: { ...this.bindings, ...arg1 }, ...msgProp });
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('trace', arg1, arg2);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: Record<string, unknown> | string, arg2?: string): void {
        this.log('fatal', arg1, arg2);
    }

    public child(bindings: Record<string, unknown>): Logger {
        const child = new FakeLogger(this.logs, { ...this.bindings, ...bindings });
        child.level = this.level;
        return child;
    }
}
