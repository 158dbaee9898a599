import type { Logger } from '@forkline/core';

export interface LogEntry {
    level: string;
    obj?: Record<string, unknown>;
    msg?: string;
}

/**
 * Records log calls in memory. Children append to the parent's `logs`
 * with their bindings merged into `obj`.
 */
export class FakeLogger implements Logger {
    public constructor(
        public readonly logs: LogEntry[] = [],
        private readonly bindings: Record<string, unknown> = {}
    ) { }

    private log(level: string, arg1: Record<string, unknown> | string, arg2?: string): void {
        const hasBindings = Object.keys(this.bindings).length > 0;
        if (typeof arg1 === 'string') {
            this.logs.push(hasBindings ? { level, obj: { ...this.bindings }, msg: arg1 } : { level, msg: arg1 });
            return;
        }
        const msgProp = arg2 !== undefined ? { msg: arg2 } : {};
        this.logs.push({ level, obj: { ...this.bindings, ...arg1 }, ...msgProp });
    }

    public messages(level?: string): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .flatMap((entry) => (entry.msg === undefined ? [] : [entry.msg]));
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
        return new FakeLogger(this.logs, { ...this.bindings, ...bindings });
    }
}
