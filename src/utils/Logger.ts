// ============================================================================
// Logger — Tagged console logging with lazy eval, delta alerts and
//          tick-based throttling
// ============================================================================

/**
 * Log levels for filtering console output.
 * Higher value = more severe (ERROR=4 is always shown).
 * TRACE is the most verbose.
 */
export const LogLevel = {
    TRACE: 0,
    DEBUG: 1,
    INFO: 2,
    WARNING: 3,
    ERROR: 4,
} as const;

export type LogLevelType = (typeof LogLevel)[keyof typeof LogLevel];

/** Message source: string or lazy function that is only called when printed. */
export type LogMessage = string | (() => string);

/** Emoji prefix for each log level. */
const LEVEL_EMOJI: Record<number, string> = {
    [LogLevel.TRACE]: "🔍",
    [LogLevel.DEBUG]: "🐛",
    [LogLevel.INFO]: "ℹ️",
    [LogLevel.WARNING]: "⚠️",
    [LogLevel.ERROR]: "🛑",
};

const LEVEL_LABELS: Record<number, string> = {
    [LogLevel.TRACE]: "TRACE",
    [LogLevel.DEBUG]: "DEBUG",
    [LogLevel.INFO]: "INFO",
    [LogLevel.WARNING]: "WARN",
    [LogLevel.ERROR]: "ERROR",
};

const LEVEL_NAMES: Record<string, LogLevelType> = {
    TRACE: LogLevel.TRACE,
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    WARN: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
};

/** Resolve a level name ("debug", "WARN", ...) to its numeric level. */
export function parseLogLevel(name: string): LogLevelType | undefined {
    return LEVEL_NAMES[name.toUpperCase().trim()];
}

/**
 * Structured logger with:
 * - Level-based filtering (TRACE → ERROR), one level shared by every tag
 * - Lazy evaluation: pass `() => "expensive " + computation` to skip the
 *   formatting cost when the message would be filtered out
 * - Delta alerts: only log when a keyed value changes
 * - Modulo throttling: log periodic status lines every N ticks
 *
 * Every kernel component owns one instance: `const log = new Logger("Scheduler")`.
 */
export class Logger {
    /** The subsystem / module tag shown in brackets. */
    private tag: string;

    private static _level: LogLevelType = LogLevel.INFO;

    /**
     * Previous values for delta alerting, keyed by `tag:key`.
     * Pruned when size exceeds 1000 entries (keys often embed PIDs).
     */
    private static _deltaCache: Map<string, string> = new Map();

    constructor(tag: string) {
        this.tag = tag;
    }

    // -----------------------------------------------------------------------
    // Public API: each accepts string OR lazy () => string
    // -----------------------------------------------------------------------

    trace(msg: LogMessage): void {
        this.log(LogLevel.TRACE, msg);
    }

    debug(msg: LogMessage): void {
        this.log(LogLevel.DEBUG, msg);
    }

    info(msg: LogMessage): void {
        this.log(LogLevel.INFO, msg);
    }

    warning(msg: LogMessage): void {
        this.log(LogLevel.WARNING, msg);
    }

    warn(msg: LogMessage): void {
        this.log(LogLevel.WARNING, msg);
    }

    error(msg: LogMessage): void {
        this.log(LogLevel.ERROR, msg);
    }

    // -----------------------------------------------------------------------
    // Smart Logging: Delta Alerts & Modulo Throttling
    // -----------------------------------------------------------------------

    /**
     * Delta Alert: only logs if `value` changed since the last call
     * with the same `key`.
     *
     * Example:
     *   log.alert("cpu", "IDLE");     // logs first time
     *   log.alert("cpu", "IDLE");     // suppressed (same)
     *   log.alert("cpu", "PID 3");    // logs (changed!)
     */
    alert(key: string, value: string, level: LogLevelType = LogLevel.INFO): void {
        if (Logger._deltaCache.size > 1000) {
            Logger._deltaCache.clear();
        }

        const fullKey = `${this.tag}:${key}`;
        if (Logger._deltaCache.get(fullKey) === value) return;
        Logger._deltaCache.set(fullKey, value);
        this.log(level, `[Δ] ${key}: ${value}`);
    }

    /**
     * Modulo Throttle: only logs when `(tick + offset) % interval === 0`.
     * `offset` staggers periodic lines from different sources (e.g. the PID).
     *
     * Example:
     *   log.throttle(clock.now, 50, () => scheduler.getReport());
     */
    throttle(
        tick: number,
        interval: number,
        msg: LogMessage,
        offset: number = 0,
        level: LogLevelType = LogLevel.INFO
    ): void {
        if ((tick + offset) % interval !== 0) return;
        this.log(level, msg);
    }

    // -----------------------------------------------------------------------
    // Core
    // -----------------------------------------------------------------------

    private log(level: LogLevelType, msg: LogMessage): void {
        if (level < Logger._level) {
            return;
        }

        // Only resolve the string now that we know it'll be printed
        const resolved = typeof msg === "function" ? msg() : msg;
        const emoji = LEVEL_EMOJI[level] ?? "";
        const label = LEVEL_LABELS[level] ?? "???";

        console.log(`${emoji} [${label}] [${this.tag}] ${resolved}`);
    }

    // -----------------------------------------------------------------------
    // Global Level Management
    // -----------------------------------------------------------------------

    /** Current effective log level. Defaults to INFO. */
    static getLevel(): LogLevelType {
        return Logger._level;
    }

    static setLevel(level: LogLevelType): void {
        Logger._level = level;
    }

    /** Clear the delta cache. */
    static resetDeltaCache(): void {
        Logger._deltaCache.clear();
    }

    /** Restore the default INFO level. */
    static resetLevel(): void {
        Logger._level = LogLevel.INFO;
    }
}
