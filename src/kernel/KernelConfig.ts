// ============================================================================
// KernelConfig — Startup options, defaults and validation
// ============================================================================

import { KernelError, KernelErrorKind } from "./KernelError";
import { parseLogLevel } from "../utils/Logger";
import type { LogLevelType } from "../utils/Logger";

/**
 * Options as persisted in `config/kernel.json`. Every key is optional;
 * missing keys take the defaults below.
 */
export interface KernelOptions {
    quantum_ms?: number;
    total_memory_kb?: number;
    reserved_memory_kb?: number;
    max_processes?: number;
    default_priority?: number;
    /** Simulated milliseconds per Clock tick. Defaults to `quantum_ms`. */
    tick_ms?: number;
    default_memory_kb?: number;
    /** Ticks a TERMINATED PCB stays visible before it is purged. */
    terminated_retention_ticks?: number;
    activity_log_limit?: number;
    log_level?: string;
}

/** Validated, fully-populated configuration handed to every component. */
export interface KernelConfig {
    readonly quantumMs: number;
    readonly tickMs: number;
    readonly totalMemoryKb: number;
    readonly reservedMemoryKb: number;
    readonly maxProcesses: number;
    readonly defaultPriority: number;
    readonly defaultMemoryKb: number;
    readonly terminatedRetentionTicks: number;
    readonly activityLogLimit: number;
    readonly logLevel: LogLevelType;
}

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 5;

export const DEFAULT_OPTIONS = {
    quantum_ms: 100,
    total_memory_kb: 1024,
    reserved_memory_kb: 256,
    max_processes: 8,
    default_priority: 3,
    default_memory_kb: 64,
    terminated_retention_ticks: 5,
    activity_log_limit: 1000,
    log_level: "INFO",
} as const;

const KNOWN_KEYS: ReadonlySet<string> = new Set([
    "quantum_ms",
    "total_memory_kb",
    "reserved_memory_kb",
    "max_processes",
    "default_priority",
    "tick_ms",
    "default_memory_kb",
    "terminated_retention_ticks",
    "activity_log_limit",
    "log_level",
]);

export function isValidPriority(priority: number): boolean {
    return Number.isInteger(priority) && priority >= MIN_PRIORITY && priority <= MAX_PRIORITY;
}

function invalid(message: string): KernelError {
    return new KernelError(KernelErrorKind.INVALID_CONFIG, message);
}

function requireInteger(name: string, value: number, min: number): number {
    if (!Number.isInteger(value) || value < min) {
        throw invalid(`${name} must be an integer >= ${min}, got ${value}`);
    }
    return value;
}

/**
 * Merge `options` over the defaults and validate the result.
 * @throws KernelError (InvalidConfig); the one place a kernel error is thrown
 */
export function resolveConfig(options: KernelOptions = {}): KernelConfig {
    const quantumMs = requireInteger("quantum_ms", options.quantum_ms ?? DEFAULT_OPTIONS.quantum_ms, 1);
    const tickMs = requireInteger("tick_ms", options.tick_ms ?? quantumMs, 1);
    const totalMemoryKb = requireInteger(
        "total_memory_kb",
        options.total_memory_kb ?? DEFAULT_OPTIONS.total_memory_kb,
        1
    );
    const reservedMemoryKb = requireInteger(
        "reserved_memory_kb",
        options.reserved_memory_kb ?? DEFAULT_OPTIONS.reserved_memory_kb,
        0
    );
    if (reservedMemoryKb >= totalMemoryKb) {
        throw invalid(
            `reserved_memory_kb (${reservedMemoryKb}) must be smaller than total_memory_kb (${totalMemoryKb})`
        );
    }

    const maxProcesses = requireInteger("max_processes", options.max_processes ?? DEFAULT_OPTIONS.max_processes, 1);
    const defaultPriority = options.default_priority ?? DEFAULT_OPTIONS.default_priority;
    if (!isValidPriority(defaultPriority)) {
        throw invalid(`default_priority must be an integer in [${MIN_PRIORITY}, ${MAX_PRIORITY}], got ${defaultPriority}`);
    }

    const levelName = options.log_level ?? DEFAULT_OPTIONS.log_level;
    const logLevel = parseLogLevel(levelName);
    if (logLevel === undefined) {
        throw invalid(`log_level "${levelName}" is not one of TRACE, DEBUG, INFO, WARNING, ERROR`);
    }

    return {
        quantumMs,
        tickMs,
        totalMemoryKb,
        reservedMemoryKb,
        maxProcesses,
        defaultPriority,
        defaultMemoryKb: requireInteger(
            "default_memory_kb",
            options.default_memory_kb ?? DEFAULT_OPTIONS.default_memory_kb,
            1
        ),
        terminatedRetentionTicks: requireInteger(
            "terminated_retention_ticks",
            options.terminated_retention_ticks ?? DEFAULT_OPTIONS.terminated_retention_ticks,
            0
        ),
        activityLogLimit: requireInteger(
            "activity_log_limit",
            options.activity_log_limit ?? DEFAULT_OPTIONS.activity_log_limit,
            1
        ),
        logLevel,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow parsed JSON into `KernelOptions`. Numeric keys must hold numbers
 * and `log_level` a string; unknown keys are returned so the caller can
 * warn about them.
 * @throws KernelError (InvalidConfig)
 */
export function parseKernelOptions(raw: unknown): { options: KernelOptions; unknownKeys: string[] } {
    if (!isRecord(raw)) {
        throw invalid("kernel configuration must be a JSON object");
    }

    const options: KernelOptions = {};
    const unknownKeys: string[] = [];

    for (const [key, value] of Object.entries(raw)) {
        if (!KNOWN_KEYS.has(key)) {
            unknownKeys.push(key);
            continue;
        }
        if (key === "log_level") {
            if (typeof value !== "string") {
                throw invalid(`log_level must be a string`);
            }
            options.log_level = value;
            continue;
        }
        if (typeof value !== "number") {
            throw invalid(`${key} must be a number`);
        }
        switch (key) {
            case "quantum_ms": options.quantum_ms = value; break;
            case "total_memory_kb": options.total_memory_kb = value; break;
            case "reserved_memory_kb": options.reserved_memory_kb = value; break;
            case "max_processes": options.max_processes = value; break;
            case "default_priority": options.default_priority = value; break;
            case "tick_ms": options.tick_ms = value; break;
            case "default_memory_kb": options.default_memory_kb = value; break;
            case "terminated_retention_ticks": options.terminated_retention_ticks = value; break;
            case "activity_log_limit": options.activity_log_limit = value; break;
        }
    }

    return { options, unknownKeys };
}
