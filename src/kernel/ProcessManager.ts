// ============================================================================
// ProcessManager — PCB table and the process state machine
// ============================================================================

import _ from "lodash";
import { ActivityCategory } from "./ActivityLog";
import { isValidPriority, MAX_PRIORITY, MIN_PRIORITY } from "./KernelConfig";
import type { KernelContext } from "./KernelContext";
import { describeError, KernelErrorKind, fail, ok } from "./KernelError";
import type { Result } from "./KernelError";
import type { MemoryManager } from "./MemoryManager";
import { canTransition, ProcessState } from "./ProcessState";
import type { ProcessStateType } from "./ProcessState";
import { Logger } from "../utils/Logger";

const log = new Logger("Process");

/** Read-only copy of a Process Control Block. */
export interface PcbView {
    readonly id: number;
    readonly name: string;
    readonly state: ProcessStateType;
    /** 1–5, higher is scheduled first. */
    readonly priority: number;
    readonly memoryBlockId: number | null;
    readonly memoryKb: number;
    /** Simulated ms left in the current slice; 0 unless RUNNING. */
    readonly quantumRemaining: number;
    readonly createdAt: number;
    readonly lastScheduledAt: number | null;
    /**
     * Logical timestamp of the last dispatch, or of creation when never
     * dispatched. Smaller means the PCB has waited longer.
     */
    readonly scheduleOrder: number;
    readonly cpuTimeMs: number;
    readonly dispatchCount: number;
    readonly terminationReason: string | null;
    readonly terminatedAt: number | null;
}

type Pcb = { -readonly [K in keyof PcbView]: PcbView[K] };

export interface TransitionEvent {
    readonly pid: number;
    readonly priority: number;
    /** `null` for the creation event. */
    readonly from: ProcessStateType | null;
    readonly to: ProcessStateType;
    readonly tick: number;
    readonly reason: string | null;
}

export type TransitionListener = (event: TransitionEvent) => void;

/** Application save/cleanup, run before the PCB reaches TERMINATED. */
export type TerminationHook = (pcb: PcbView, reason: string) => void;

/**
 * Owns every PCB. All state changes go through `transition()`, which checks
 * the table in ProcessState.ts and the single-RUNNING rule before touching
 * anything; a rejected change is logged and leaves the PCB as it was.
 *
 * Memory is requested from the MemoryManager on spawn and released on
 * terminate, before the PCB is marked TERMINATED.
 */
export class ProcessManager {
    private table: Map<number, Pcb> = new Map();

    /** Monotonically increasing PID counter. */
    private nextPid: number = 1;

    /** Logical clock behind `scheduleOrder`. */
    private sequence: number = 0;

    private running: number | null = null;
    private listeners: TransitionListener[] = [];
    private terminationHooks: Map<number, TerminationHook> = new Map();
    private terminating: Set<number> = new Set();

    constructor(private readonly ctx: KernelContext, private readonly memory: MemoryManager) {}

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    /**
     * Create a process. Memory errors do not fail the call: the PCB goes
     * straight from NEW to TERMINATED with the error kind as its reason.
     */
    spawn(
        name: string,
        priority: number = this.ctx.config.defaultPriority,
        memoryKb: number = this.ctx.config.defaultMemoryKb
    ): Result<number> {
        if (!isValidPriority(priority)) {
            return fail(
                KernelErrorKind.INVALID_PRIORITY,
                `Priority ${priority} for '${name}' is outside [${MIN_PRIORITY}, ${MAX_PRIORITY}]`
            );
        }
        if (this.liveCount >= this.ctx.config.maxProcesses) {
            log.warning(`Cannot spawn '${name}': process limit ${this.ctx.config.maxProcesses} reached`);
            return fail(
                KernelErrorKind.TOO_MANY_PROCESSES,
                `Process limit ${this.ctx.config.maxProcesses} reached`
            );
        }

        const now = this.ctx.clock.now;
        const pcb: Pcb = {
            id: this.nextPid++,
            name,
            state: ProcessState.NEW,
            priority,
            memoryBlockId: null,
            memoryKb,
            quantumRemaining: 0,
            createdAt: now,
            lastScheduledAt: null,
            scheduleOrder: ++this.sequence,
            cpuTimeMs: 0,
            dispatchCount: 0,
            terminationReason: null,
            terminatedAt: null,
        };
        this.table.set(pcb.id, pcb);
        this.emit({ pid: pcb.id, priority, from: null, to: ProcessState.NEW, tick: now, reason: null });

        const allocation = this.memory.allocate(pcb.id, memoryKb, name);
        if (!allocation.ok) {
            const reason = allocation.error.kind;
            this.transition(pcb, ProcessState.TERMINATED, reason, (p) => {
                p.terminationReason = reason;
                p.terminatedAt = now;
            });
            log.warning(`Process '${name}' (PID ${pcb.id}) could not start: ${allocation.error.message}`);
            this.ctx.activity.record(ActivityCategory.PROCESS, `Failed to create process '${name}' (PID=${pcb.id}): ${reason}`);
            return ok(pcb.id);
        }

        this.transition(pcb, ProcessState.READY, null, (p) => {
            p.memoryBlockId = allocation.value;
        });
        log.info(`Process created: ${name} (PID=${pcb.id}, Priority=${priority}, Memory=${memoryKb}KB)`);
        this.ctx.activity.record(ActivityCategory.PROCESS, `Process created: ${name} (PID=${pcb.id}, Memory=${memoryKb}KB)`);
        return ok(pcb.id);
    }

    /**
     * Move a process to TERMINATED from any live state. The termination hook
     * runs first, then the memory block is freed, then the state changes.
     */
    terminate(pid: number, reason: string): Result<void> {
        const pcb = this.table.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (!canTransition(pcb.state, ProcessState.TERMINATED) || this.terminating.has(pid)) {
            return this.reject(pcb, ProcessState.TERMINATED);
        }

        this.terminating.add(pid);
        try {
            this.runTerminationHook(pcb, reason);
            this.releaseMemory(pcb);
            const now = this.ctx.clock.now;
            const result = this.transition(pcb, ProcessState.TERMINATED, reason, (p) => {
                p.memoryBlockId = null;
                p.quantumRemaining = 0;
                p.terminationReason = reason;
                p.terminatedAt = now;
            });
            log.info(`Process terminated: ${pcb.name} (PID=${pid}, reason=${reason})`);
            this.ctx.activity.record(ActivityCategory.PROCESS, `Process terminated: ${pcb.name} (PID=${pid}): ${reason}`);
            return result;
        } finally {
            this.terminating.delete(pid);
        }
    }

    /** RUNNING → WAITING. */
    block(pid: number): Result<void> {
        return this.expect(pid, ProcessState.RUNNING, ProcessState.WAITING, (p) => {
            p.quantumRemaining = 0;
        });
    }

    /** WAITING → READY. */
    unblock(pid: number): Result<void> {
        return this.expect(pid, ProcessState.WAITING, ProcessState.READY);
    }

    /** READY → RUNNING with a fresh quantum. */
    dispatch(pid: number): Result<void> {
        const now = this.ctx.clock.now;
        return this.expect(pid, ProcessState.READY, ProcessState.RUNNING, (p) => {
            p.quantumRemaining = this.ctx.config.quantumMs;
            p.lastScheduledAt = now;
            p.scheduleOrder = ++this.sequence;
            p.dispatchCount++;
        });
    }

    /** RUNNING → READY (quantum expiry or voluntary yield). */
    preempt(pid: number, reason: string | null = null): Result<void> {
        return this.expect(pid, ProcessState.RUNNING, ProcessState.READY, (p) => {
            p.quantumRemaining = 0;
        }, reason);
    }

    /**
     * Charge `ms` of CPU time to the RUNNING process and shrink its slice.
     * Returns what is left of the quantum.
     */
    consumeQuantum(pid: number, ms: number): Result<number> {
        const pcb = this.table.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (pcb.state !== ProcessState.RUNNING) {
            return fail(KernelErrorKind.INVALID_TRANSITION, `PID ${pid} is ${pcb.state}, not RUNNING`);
        }
        pcb.cpuTimeMs += ms;
        pcb.quantumRemaining = Math.max(0, pcb.quantumRemaining - ms);
        return ok(pcb.quantumRemaining);
    }

    /** Administrative priority change. */
    setPriority(pid: number, priority: number): Result<void> {
        const pcb = this.table.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (!isValidPriority(priority)) {
            return fail(
                KernelErrorKind.INVALID_PRIORITY,
                `Priority ${priority} is outside [${MIN_PRIORITY}, ${MAX_PRIORITY}]`
            );
        }
        if (pcb.state === ProcessState.TERMINATED) {
            return fail(KernelErrorKind.INVALID_TRANSITION, `PID ${pid} is TERMINATED`);
        }
        log.info(`Priority of ${pcb.name} (PID=${pid}): ${pcb.priority} → ${priority}`);
        pcb.priority = priority;
        return ok(undefined);
    }

    /** Register the save/cleanup hook for `pid`; it runs at most once. */
    onTerminate(pid: number, hook: TerminationHook): Result<void> {
        const pcb = this.table.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (pcb.state === ProcessState.TERMINATED) {
            return fail(KernelErrorKind.INVALID_TRANSITION, `PID ${pid} is already TERMINATED`);
        }
        this.terminationHooks.set(pid, hook);
        return ok(undefined);
    }

    /**
     * Drop TERMINATED PCBs that have been visible for `retentionTicks`.
     * Returns the purged PIDs.
     */
    purgeTerminated(now: number, retentionTicks: number): number[] {
        const purged: number[] = [];
        for (const [pid, pcb] of this.table) {
            if (pcb.terminatedAt !== null && now - pcb.terminatedAt >= retentionTicks) {
                purged.push(pid);
            }
        }
        for (const pid of purged) {
            this.table.delete(pid);
        }
        if (purged.length > 0) {
            log.debug(() => `Purged terminated PIDs ${purged.join(", ")}`);
        }
        return purged;
    }

    // -----------------------------------------------------------------------
    // Queries
    // -----------------------------------------------------------------------

    get(pid: number): PcbView | undefined {
        const pcb = this.table.get(pid);
        return pcb ? { ...pcb } : undefined;
    }

    /** Copies of every PCB (TERMINATED ones until purged), ordered by id. */
    snapshot(): PcbView[] {
        return _.sortBy(Array.from(this.table.values(), (pcb) => ({ ...pcb })), (pcb) => pcb.id);
    }

    runningPid(): number | null {
        return this.running;
    }

    /** Processes that are not TERMINATED. */
    get liveCount(): number {
        let count = 0;
        for (const pcb of this.table.values()) {
            if (pcb.state !== ProcessState.TERMINATED) count++;
        }
        return count;
    }

    /** Listen to every committed transition; returns an unsubscribe function. */
    subscribe(listener: TransitionListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }

    // -----------------------------------------------------------------------
    // State machine core
    // -----------------------------------------------------------------------

    private expect(
        pid: number,
        from: ProcessStateType,
        to: ProcessStateType,
        apply?: (pcb: Pcb) => void,
        reason: string | null = null
    ): Result<void> {
        const pcb = this.table.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (pcb.state !== from) {
            return this.reject(pcb, to);
        }
        return this.transition(pcb, to, reason, apply);
    }

    /**
     * The only place a PCB's state changes. Validation happens before any
     * mutation, so a rejected call leaves the PCB untouched.
     */
    private transition(
        pcb: Pcb,
        to: ProcessStateType,
        reason: string | null = null,
        apply?: (pcb: Pcb) => void
    ): Result<void> {
        const from = pcb.state;
        if (!canTransition(from, to)) {
            return this.reject(pcb, to);
        }
        if (to === ProcessState.RUNNING && this.running !== null && this.running !== pcb.id) {
            return this.reject(pcb, to, `PID ${this.running} is already RUNNING`);
        }

        apply?.(pcb);
        pcb.state = to;
        if (to === ProcessState.RUNNING) {
            this.running = pcb.id;
        } else if (this.running === pcb.id) {
            this.running = null;
        }

        log.trace(() => `PID ${pcb.id} state: ${from} → ${to}`);
        this.emit({ pid: pcb.id, priority: pcb.priority, from, to, tick: this.ctx.clock.now, reason });
        return ok(undefined);
    }

    private reject(pcb: Pcb, to: ProcessStateType, detail?: string): Result<void> {
        const message = `PID ${pcb.id} (${pcb.name}): ${pcb.state} → ${to} is not allowed` + (detail ? ` (${detail})` : "");
        log.warning(`Rejected transition: ${message}`);
        return fail(KernelErrorKind.INVALID_TRANSITION, message);
    }

    private emit(event: TransitionEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (e: unknown) {
                log.error(`Transition listener failed for PID ${event.pid}:\n${describeError(e)}`);
            }
        }
    }

    private runTerminationHook(pcb: Pcb, reason: string): void {
        const hook = this.terminationHooks.get(pcb.id);
        if (!hook) return;
        this.terminationHooks.delete(pcb.id);
        try {
            hook({ ...pcb }, reason);
        } catch (e: unknown) {
            log.error(`Termination hook for ${pcb.name} (PID ${pcb.id}) crashed:\n${describeError(e)}`);
        }
    }

    private releaseMemory(pcb: Pcb): void {
        if (pcb.memoryBlockId === null) return;
        const freed = this.memory.free(pcb.memoryBlockId);
        if (!freed.ok) {
            log.error(`Could not free block ${pcb.memoryBlockId} of PID ${pcb.id}: ${freed.error.message}`);
        }
    }
}
