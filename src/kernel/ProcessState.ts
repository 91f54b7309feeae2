// ============================================================================
// ProcessState — Runtime constants for the PCB state machine
// ============================================================================

/**
 * Plain constants instead of a `const enum` so the values exist at runtime
 * both in the compiled build and under tsx (mocha tests).
 */
export const ProcessState = {
    NEW: "NEW",
    READY: "READY",
    RUNNING: "RUNNING",
    WAITING: "WAITING",
    TERMINATED: "TERMINATED",
} as const;

export type ProcessStateType = (typeof ProcessState)[keyof typeof ProcessState];

/**
 * Legal transitions, keyed by source state.
 *
 *   NEW      → READY (allocation ok) | TERMINATED (allocation failed)
 *   READY    → RUNNING (dispatch)    | TERMINATED (killed)
 *   RUNNING  → READY (expiry/yield)  | WAITING (block) | TERMINATED
 *   WAITING  → READY (unblock)       | TERMINATED (killed)
 *   TERMINATED is final.
 */
export const TRANSITIONS: Readonly<Record<ProcessStateType, readonly ProcessStateType[]>> = {
    [ProcessState.NEW]: [ProcessState.READY, ProcessState.TERMINATED],
    [ProcessState.READY]: [ProcessState.RUNNING, ProcessState.TERMINATED],
    [ProcessState.RUNNING]: [ProcessState.READY, ProcessState.WAITING, ProcessState.TERMINATED],
    [ProcessState.WAITING]: [ProcessState.READY, ProcessState.TERMINATED],
    [ProcessState.TERMINATED]: [],
};

export function canTransition(from: ProcessStateType, to: ProcessStateType): boolean {
    return TRANSITIONS[from].includes(to);
}

/** Every state, in lifecycle order. */
export const ALL_STATES: readonly ProcessStateType[] = Object.values(ProcessState);
