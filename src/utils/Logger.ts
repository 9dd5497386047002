/**
 * Internal logging utility for packetflow.
 * Provides structured logging with levels and tags, allowing for
 * easy control of log noise in production environments.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVELS_BY_NAME[name];
}

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private readonly tag: string;
    private useJson: boolean = false;

    constructor(tag: string = 'packetflow', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public get tagName(): string {
        return this.tag;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: 'debug' | 'info' | 'warn' | 'error', levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args.map(serializeArg) : undefined
            };
            console[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' WARN' : ''}${levelName === 'ERROR' ? ' ERROR' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    /**
     * Connection lifecycle chatter; only visible at DEBUG.
     */
    public conn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'CONN', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(this.level);
        child.setJson(this.useJson);
        return child;
    }

    /**
     * Support for JSON.stringify(logger)
     */
    public toJSON() {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }
}

function serializeArg(arg: unknown): unknown {
    if (arg instanceof Error) {
        return { name: arg.name, message: arg.message };
    }
    if (arg instanceof Uint8Array) {
        return `<${arg.length} bytes>`;
    }
    return arg;
}

// Global default logger
export const logger = new Logger('packetflow');
