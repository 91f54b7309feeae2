// ============================================================================
// Scheduler — Round-robin with priority over bucketed ready queues
// ============================================================================

import _ from "lodash";
import { ActivityCategory } from "./ActivityLog";
import { MAX_PRIORITY, MIN_PRIORITY } from "./KernelConfig";
import type { KernelContext } from "./KernelContext";
import { KernelErrorKind, fail, ok } from "./KernelError";
import type { Result } from "./KernelError";
import type { ProcessManager, TransitionEvent } from "./ProcessManager";
import { ProcessState } from "./ProcessState";
import { Logger, LogLevel } from "../utils/Logger";

const log = new Logger("Scheduler");

/** Ticks between periodic scheduler reports at DEBUG level. */
const REPORT_INTERVAL = 50;

// ---------------------------------------------------------------------------
// Selection — pure, callable from tests without a kernel
// ---------------------------------------------------------------------------

export interface SchedulingCandidate {
    readonly id: number;
    readonly priority: number;
    readonly scheduleOrder: number;
}

/**
 * Pick the next PCB to dispatch: highest priority, then the one that has
 * waited longest since it was last scheduled, then the lowest id.
 *
 * `excludePid` is the PCB whose slice just ended; it is only picked when it
 * is the sole candidate.
 */
export function pickNextProcess<T extends SchedulingCandidate>(
    candidates: readonly T[],
    excludePid: number | null = null
): T | null {
    const eligible = candidates.filter((c) => c.id !== excludePid);
    const pool = eligible.length > 0 ? eligible : candidates;
    const ordered = _.orderBy(
        pool,
        [(c) => c.priority, (c) => c.scheduleOrder, (c) => c.id],
        ["desc", "asc", "asc"]
    );
    return ordered[0] ?? null;
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

/** What one `tick()` did, in the order it did it. */
export interface TickReport {
    readonly tick: number;
    /** PID charged for this tick, `null` when the CPU was free. */
    readonly ran: number | null;
    /** PID preempted because its quantum ran out. */
    readonly expired: number | null;
    readonly unblocked: number[];
    readonly dispatched: number | null;
    /** Nothing ran and nothing was dispatched. */
    readonly idle: boolean;
}

export interface SchedulerStats {
    readonly ticks: number;
    readonly busyTicks: number;
    readonly idleTicks: number;
    readonly dispatches: number;
    readonly contextSwitches: number;
    /** Busy ticks as a percentage of all ticks. */
    readonly cpuUtilization: number;
}

export interface QueueStatus {
    readonly running: number | null;
    /** Priority level → READY PIDs in arrival order. */
    readonly ready: Record<number, number[]>;
    readonly waiting: number[];
    readonly pendingUnblocks: number[];
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

/**
 * Owns the ready queue and drives every scheduling transition through the
 * ProcessManager. The buckets follow the PCB table by listening to its
 * transition events; a bucket entry that has gone stale by the time it is
 * read is dropped and selection re-runs.
 *
 * Per tick, in this order:
 *   1. charge `tick_ms` to the RUNNING PCB, preempt it on quantum expiry
 *   2. apply pending unblock events in arrival order
 *   3. one dispatch decision if the CPU is free
 */
export class Scheduler {
    /** priority → READY PIDs. */
    private readyBuckets: Map<number, number[]> = new Map();

    private pendingUnblocks: number[] = [];

    /** PCB whose slice just ended; skipped by the next decision if possible. */
    private sliceEnded: number | null = null;

    private lastDispatched: number | null = null;
    private ticks: number = 0;
    private busyTicks: number = 0;
    private dispatches: number = 0;
    private contextSwitches: number = 0;
    private lastReport: TickReport | null = null;

    constructor(private readonly ctx: KernelContext, private readonly processes: ProcessManager) {
        for (let p = MAX_PRIORITY; p >= MIN_PRIORITY; p--) {
            this.readyBuckets.set(p, []);
        }
        processes.subscribe((event) => this.onTransition(event));
    }

    // -----------------------------------------------------------------------
    // Tick
    // -----------------------------------------------------------------------

    tick(): TickReport {
        const tick = this.ctx.clock.now;
        let ran: number | null = null;
        let expired: number | null = null;

        const running = this.processes.runningPid();
        if (running !== null) {
            ran = running;
            const left = this.processes.consumeQuantum(running, this.ctx.config.tickMs);
            if (left.ok && left.value <= 0 && this.endSlice(running, "quantum expired").ok) {
                expired = running;
            }
        }

        const unblocked = this.applyUnblocks();
        const dispatched = this.dispatchNext();
        const idle = ran === null && dispatched === null;

        this.ticks++;
        if (!idle) this.busyTicks++;

        this.lastReport = { tick, ran, expired, unblocked, dispatched, idle };
        log.alert("cpu", idle ? "IDLE" : `PID ${this.processes.runningPid() ?? "-"}`, LogLevel.DEBUG);
        log.throttle(tick, REPORT_INTERVAL, () => this.getReport(), 0, LogLevel.DEBUG);
        return this.lastReport;
    }

    // -----------------------------------------------------------------------
    // Requests
    // -----------------------------------------------------------------------

    /** RUNNING → READY before the quantum runs out, then dispatch. */
    yield(pid: number): Result<void> {
        const result = this.endSlice(pid, "yield");
        if (result.ok) {
            this.dispatchNext();
        }
        return result;
    }

    /** RUNNING → WAITING, then dispatch another PCB straight away. */
    block(pid: number): Result<void> {
        const result = this.processes.block(pid);
        if (result.ok) {
            this.ctx.activity.record(ActivityCategory.SCHEDULER, `PID ${pid} blocked`);
            this.dispatchNext();
        }
        return result;
    }

    /** Queue a WAITING → READY event for the next tick. */
    requestUnblock(pid: number): Result<void> {
        const pcb = this.processes.get(pid);
        if (!pcb) {
            return fail(KernelErrorKind.UNKNOWN_PROCESS, `No process with PID ${pid}`);
        }
        if (pcb.state !== ProcessState.WAITING) {
            log.warning(`Unblock ignored: PID ${pid} is ${pcb.state}, not WAITING`);
            return fail(KernelErrorKind.INVALID_TRANSITION, `PID ${pid} is ${pcb.state}, not WAITING`);
        }
        if (!this.pendingUnblocks.includes(pid)) {
            this.pendingUnblocks.push(pid);
        }
        return ok(undefined);
    }

    /** Terminate through the ProcessManager; a freed CPU is refilled at once. */
    terminate(pid: number, reason: string): Result<void> {
        const wasRunning = this.processes.runningPid() === pid;
        const result = this.processes.terminate(pid, reason);
        if (result.ok && wasRunning) {
            this.dispatchNext();
        }
        return result;
    }

    setPriority(pid: number, priority: number): Result<void> {
        const result = this.processes.setPriority(pid, priority);
        if (result.ok && this.processes.get(pid)?.state === ProcessState.READY) {
            this.removeFromBuckets(pid);
            this.bucket(priority).push(pid);
        }
        return result;
    }

    // -----------------------------------------------------------------------
    // Queries
    // -----------------------------------------------------------------------

    getQueueStatus(): QueueStatus {
        const ready: Record<number, number[]> = {};
        for (const [priority, pids] of this.readyBuckets) {
            ready[priority] = [...pids];
        }
        return {
            running: this.processes.runningPid(),
            ready,
            waiting: this.processes
                .snapshot()
                .filter((p) => p.state === ProcessState.WAITING)
                .map((p) => p.id),
            pendingUnblocks: [...this.pendingUnblocks],
        };
    }

    getStats(): SchedulerStats {
        return {
            ticks: this.ticks,
            busyTicks: this.busyTicks,
            idleTicks: this.ticks - this.busyTicks,
            dispatches: this.dispatches,
            contextSwitches: this.contextSwitches,
            cpuUtilization: this.ticks === 0 ? 0 : (this.busyTicks / this.ticks) * 100,
        };
    }

    getLastReport(): TickReport | null {
        return this.lastReport;
    }

    /** Formatted summary for console output. */
    getReport(): string {
        const s = this.getStats();
        const running = this.processes.runningPid();
        const pcb = running !== null ? this.processes.get(running) : undefined;

        let msg = `\n--- ⚙️ SCHEDULER (Tick ${this.ctx.clock.now}) ---\n`;
        msg += pcb
            ? `Running: PID ${pcb.id} (${pcb.name}) [P${pcb.priority}] | Quantum left: ${pcb.quantumRemaining}ms\n`
            : `Running: IDLE\n`;
        msg += `Ticks: ${s.ticks} (${s.busyTicks} busy, ${s.idleTicks} idle) | CPU: ${s.cpuUtilization.toFixed(1)}%\n`;
        msg += `Dispatches: ${s.dispatches} | Context switches: ${s.contextSwitches}\n`;

        for (const [priority, pids] of this.readyBuckets) {
            if (pids.length === 0) continue;
            msg += `  P${priority} ${"█".repeat(Math.min(pids.length, 30))} ${pids.join(", ")}\n`;
        }
        return msg;
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private onTransition(event: TransitionEvent): void {
        if (event.from === ProcessState.READY) {
            this.removeFromBuckets(event.pid);
        }
        if (event.to === ProcessState.READY) {
            this.bucket(event.priority).push(event.pid);
        }
        if (event.to === ProcessState.TERMINATED) {
            _.pull(this.pendingUnblocks, event.pid);
            if (this.sliceEnded === event.pid) this.sliceEnded = null;
        }
    }

    private bucket(priority: number): number[] {
        let pids = this.readyBuckets.get(priority);
        if (!pids) {
            pids = [];
            this.readyBuckets.set(priority, pids);
        }
        return pids;
    }

    private removeFromBuckets(pid: number): void {
        for (const pids of this.readyBuckets.values()) {
            _.pull(pids, pid);
        }
    }

    /** RUNNING → READY; remembers the PID so the next decision passes it over. */
    private endSlice(pid: number, reason: string): Result<void> {
        const result = this.processes.preempt(pid, reason);
        if (result.ok) {
            this.sliceEnded = pid;
            log.debug(() => `PID ${pid} preempted (${reason})`);
        }
        return result;
    }

    private applyUnblocks(): number[] {
        const unblocked: number[] = [];
        const pending = this.pendingUnblocks;
        this.pendingUnblocks = [];
        for (const pid of pending) {
            const result = this.processes.unblock(pid);
            if (result.ok) {
                unblocked.push(pid);
            } else {
                log.debug(() => `Dropped unblock for PID ${pid}: ${result.error.message}`);
            }
        }
        return unblocked;
    }

    /** READY PCBs from the buckets, highest priority first; stale entries are dropped. */
    private readyCandidates(): { id: number; priority: number; scheduleOrder: number }[] {
        const candidates: { id: number; priority: number; scheduleOrder: number }[] = [];
        for (const pids of this.readyBuckets.values()) {
            for (const pid of [...pids]) {
                const pcb = this.processes.get(pid);
                if (!pcb || pcb.state !== ProcessState.READY) {
                    log.debug(() => `PID ${pid} left the ready queue before dispatch`);
                    _.pull(pids, pid);
                    continue;
                }
                candidates.push({ id: pcb.id, priority: pcb.priority, scheduleOrder: pcb.scheduleOrder });
            }
        }
        return candidates;
    }

    /** One dispatch decision. Returns the dispatched PID, or `null` when idle. */
    private dispatchNext(): number | null {
        if (this.processes.runningPid() !== null) return null;

        const exclude = this.sliceEnded;
        this.sliceEnded = null;

        for (;;) {
            const next = pickNextProcess(this.readyCandidates(), exclude);
            if (!next) return null;

            const result = this.processes.dispatch(next.id);
            if (!result.ok) {
                // Gone between selection and dispatch: drop it and choose again
                log.debug(() => `Dispatch of PID ${next.id} failed (${result.error.kind}); re-evaluating`);
                this.removeFromBuckets(next.id);
                continue;
            }

            this.dispatches++;
            if (this.lastDispatched !== null && this.lastDispatched !== next.id) {
                this.contextSwitches++;
            }
            this.lastDispatched = next.id;
            log.debug(() => `Dispatched PID ${next.id} [P${next.priority}]`);
            this.ctx.activity.record(ActivityCategory.SCHEDULER, `Dispatched PID ${next.id}`);
            return next.id;
        }
    }
}
