/**
 * Contract: Logger -- transport-based logging with pluggable handlers.
 *
 * Sections:
 *   1. Handler management
 *   2. Logging methods (debug, warn, error)
 *   3. Entry shape
 *   4. Console handler formatting
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleHandler } from "./console-handler";
import { Logger } from "./logger";
import type { LogEntry } from "./types";

function capture(logger: Logger): LogEntry[] {
    const entries: LogEntry[] = [];
    logger.addHandler((entry) => {
        entries.push(entry);
    });
    return entries;
}

describe("Logger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // -- 1. Handler management --
    describe("Handler management", () => {
        it("addHandler registers a handler that receives entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.debug("bind", "hello");
            expect(handler).toHaveBeenCalledOnce();
        });

        it("removeHandler stops the handler from receiving entries", () => {
            const logger = new Logger();
            const handler = vi.fn();
            logger.addHandler(handler);
            logger.removeHandler(handler);
            logger.debug("bind", "hello");
            expect(handler).not.toHaveBeenCalled();
            expect(logger.handlerCount).toBe(0);
        });

        it("fans out to multiple handlers", () => {
            const logger = new Logger();
            const a = vi.fn();
            const b = vi.fn();
            logger.addHandler(a);
            logger.addHandler(b);
            logger.warn("bind", "hello");
            expect(a).toHaveBeenCalledOnce();
            expect(b).toHaveBeenCalledOnce();
            expect(logger.handlerCount).toBe(2);
        });

        it("no handlers means no error (silent)", () => {
            const logger = new Logger();
            expect(() => logger.error("bind", "hello")).not.toThrow();
        });
    });

    // -- 2. Logging methods --
    describe("Logging methods", () => {
        it("debug() emits entry with level 'debug'", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("unbind", "removed");
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({ level: "debug", code: "unbind", message: "removed" });
        });

        it("warn() emits entry with level 'warn'", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.warn("clear", "dropped");
            expect(entries[0]).toMatchObject({ level: "warn", code: "clear", message: "dropped" });
        });

        it("error() emits entry with level 'error' and details", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.error("handler-failed", "boom", { event: "StringEvent" });
            expect(entries[0]).toMatchObject({
                level: "error",
                code: "handler-failed",
                message: "boom",
                details: { event: "StringEvent" },
            });
        });
    });

    // -- 3. Entry shape --
    describe("Entry shape", () => {
        it("stamps entries with Date.now()", () => {
            vi.spyOn(Date, "now").mockReturnValue(1_700_000_000_000);
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("bind", "msg");
            expect(entries[0]?.timestamp).toBe(1_700_000_000_000);
        });

        it("details is undefined when not provided", () => {
            const logger = new Logger();
            const entries = capture(logger);
            logger.debug("bind", "msg");
            expect(entries[0]?.details).toBeUndefined();
        });
    });

    // -- 4. Console handler --
    describe("Console handler (createConsoleHandler)", () => {
        it("logs debug to console.log with the library tag", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "debug", code: "bind", message: "StringEvent", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[signal-bus] bind → StringEvent");
        });

        it("logs warn to console.warn", () => {
            const spy = vi.spyOn(console, "warn").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "warn", code: "clear", message: "slow", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[warn]");
        });

        it("logs error to console.error", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "error", code: "handler-failed", message: "down", timestamp: 0 });
            expect(spy).toHaveBeenCalledOnce();
            expect(spy.mock.calls[0]?.[0]).toContain("[error] handler-failed → down");
        });

        it("renders details as colored key=value pairs", () => {
            const spy = vi.spyOn(console, "log").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({
                level: "debug",
                code: "bind",
                message: "StringEvent",
                details: { method: "say", listeners: 2 },
                timestamp: 0,
            });
            const line = String(spy.mock.calls[0]?.[0]);
            expect(line.slice(0, 8)).toMatch(/^\d{2}:\d{2}:\d{2}$/);
            expect(line.slice(9)).toBe(
                '[signal-bus] bind → StringEvent \x1b[36mmethod\x1b[0m=\x1b[32m"say"\x1b[0m \x1b[36mlisteners\x1b[0m=\x1b[33m2\x1b[0m',
            );
        });

        it("renders other detail values as dimmed JSON", () => {
            const spy = vi.spyOn(console, "error").mockImplementation(() => {});
            const handler = createConsoleHandler();
            handler({ level: "error", code: "handler-failed", message: "X", details: { fatal: true }, timestamp: 0 });
            expect(spy.mock.calls[0]?.[0]).toContain("\x1b[36mfatal\x1b[0m=\x1b[90mtrue\x1b[0m");
        });
    });
});
