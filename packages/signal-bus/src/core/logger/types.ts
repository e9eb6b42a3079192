export type LogLevel = "debug" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}
