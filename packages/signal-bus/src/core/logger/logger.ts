import type { LogEntry, LoggerContext, LogHandler } from "./types";

/**
 * Transport-style logger. Entries fan out to every registered handler;
 * with no handlers attached, logging is a no-op.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    get handlerCount(): number {
        return this.handlers.size;
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("error", code, message, details);
    }

    private write(
        level: LogEntry["level"],
        code: string,
        message: string,
        details?: Record<string, unknown>,
    ): void {
        if (this.handlers.size === 0) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
