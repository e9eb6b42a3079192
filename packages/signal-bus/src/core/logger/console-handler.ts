import type { LogEntry, LogHandler, LogLevel } from "./types";

const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const dim = "\x1b[90m";
const reset = "\x1b[0m";

const OUTPUT: Record<LogLevel, { tag: string; write: (line: string) => void }> = {
    debug: { tag: "signal-bus", write: (line) => console.log(line) },
    warn: { tag: "warn", write: (line) => console.warn(line) },
    error: { tag: "error", write: (line) => console.error(line) },
};

// Bus details are flat: names, counts and error messages.
function formatValue(value: unknown): string {
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number") return `${yellow}${value}${reset}`;
    return `${dim}${JSON.stringify(value) ?? String(value)}${reset}`;
}

function formatDetails(details: Record<string, unknown> | undefined): string {
    if (!details) return "";
    return Object.entries(details)
        .map(([key, value]) => ` ${cyan}${key}${reset}=${formatValue(value)}`)
        .join("");
}

/** `HH:MM:SS [tag] code → message key=value…`, routed to the console method matching the level. */
export function createConsoleHandler(): LogHandler {
    return (entry: LogEntry) => {
        const time = new Date(entry.timestamp).toTimeString().slice(0, 8);
        const { tag, write } = OUTPUT[entry.level];
        write(`${time} [${tag}] ${entry.code} → ${entry.message}${formatDetails(entry.details)}`);
    };
}
