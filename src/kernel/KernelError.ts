// ============================================================================
// KernelError — Error kinds and the Result type returned by every request
// ============================================================================

export const KernelErrorKind = {
    OUT_OF_MEMORY: "OutOfMemory",
    INVALID_SIZE: "InvalidSize",
    UNKNOWN_BLOCK: "UnknownBlock",
    INVALID_TRANSITION: "InvalidTransition",
    TOO_MANY_PROCESSES: "TooManyProcesses",
    UNKNOWN_PROCESS: "UnknownProcess",
    INVALID_PRIORITY: "InvalidPriority",
    INVALID_CONFIG: "InvalidConfig",
} as const;

export type KernelErrorKindType = (typeof KernelErrorKind)[keyof typeof KernelErrorKind];

/**
 * A rejected kernel request. Requests hand these back inside a `Result`;
 * only `resolveConfig` throws one, at startup.
 */
export class KernelError extends Error {
    readonly kind: KernelErrorKindType;

    constructor(kind: KernelErrorKindType, message: string) {
        super(message);
        this.name = "KernelError";
        this.kind = kind;
    }

    toString(): string {
        return `${this.kind}: ${this.message}`;
    }
}

export type Result<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: KernelError };

export function ok<T>(value: T): Result<T> {
    return { ok: true, value };
}

export function fail<T = never>(kind: KernelErrorKindType, message: string): Result<T> {
    return { ok: false, error: new KernelError(kind, message) };
}

/** Human-readable message for anything caught from collaborator code. */
export function describeError(e: unknown): string {
    return e instanceof Error ? e.stack ?? e.message : String(e);
}
