/**
 * Planner logger. Keeps a circular buffer of recent entries so a feedback
 * report can include what happened in the session, and forwards entries at or
 * above the console level to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogEntry = {
    timestamp: number;
    level: LogLevel;
    scope: string;
    message: string;
};

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isTestEnv(): boolean {
    return typeof process !== 'undefined' && process.env?.NODE_ENV === 'test';
}

class Logger {
    private static instance: Logger;
    private logs: LogEntry[] = [];
    private readonly maxLogs = 1000;
    private consoleLevel: LogLevel | 'silent' = isTestEnv() ? 'silent' : 'info';

    private constructor() {}

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setConsoleLevel(level: LogLevel | 'silent') {
        this.consoleLevel = level;
    }

    public debug(scope: string, message: string, detail?: unknown) {
        this.addLog('debug', scope, message, detail);
    }

    public info(scope: string, message: string, detail?: unknown) {
        this.addLog('info', scope, message, detail);
    }

    public warn(scope: string, message: string, detail?: unknown) {
        this.addLog('warn', scope, message, detail);
    }

    public error(scope: string, message: string, detail?: unknown) {
        this.addLog('error', scope, message, detail);
    }

    private addLog(level: LogLevel, scope: string, message: string, detail?: unknown) {
        const text = detail === undefined ? message : `${message} ${stringify(detail)}`;

        this.logs.push({
            timestamp: Date.now(),
            level,
            scope,
            message: text,
        });

        if (this.logs.length > this.maxLogs) {
            this.logs.shift();
        }

        if (LEVEL_RANK[level] >= LEVEL_RANK[this.consoleLevel]) {
            console[level](`[${scope}] ${text}`);
        }
    }

    public getEntries(): readonly LogEntry[] {
        return this.logs;
    }

    public getLogs(): string {
        return this.logs.map(log => {
            const time = new Date(log.timestamp).toLocaleTimeString();
            return `[${time}] [${log.level.toUpperCase()}] [${log.scope}] ${log.message}`;
        }).join('\n');
    }

    public clear() {
        this.logs = [];
    }
}

function stringify(value: unknown): string {
    if (value instanceof Error) return `${value.name}: ${value.message}`;
    if (typeof value === 'object' && value !== null) {
        try {
            return JSON.stringify(value);
        } catch {
            return String(value);
        }
    }
    return String(value);
}

export const logger = Logger.getInstance();
