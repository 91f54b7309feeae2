// ============================================================================
// Kernel — Composition root: Clock → Scheduler → ProcessManager → Memory
// ============================================================================

import { ActivityCategory } from "./ActivityLog";
import type { ActivityEntry } from "./ActivityLog";
import type { KernelConfig, KernelOptions } from "./KernelConfig";
import { createKernelContext } from "./KernelContext";
import type { KernelContext } from "./KernelContext";
import { describeError, ok } from "./KernelError";
import type { Result } from "./KernelError";
import { MemoryManager } from "./MemoryManager";
import type { MemorySegment, MemoryUsage } from "./MemoryManager";
import { ProcessManager } from "./ProcessManager";
import type { PcbView } from "./ProcessManager";
import { ProcessState } from "./ProcessState";
import { Scheduler } from "./Scheduler";
import type { QueueStatus, SchedulerStats, TickReport } from "./Scheduler";
import { APP_CATALOG } from "../apps/AppCatalog";
import type { AppIdType } from "../apps/AppCatalog";
import { AppProcess } from "../apps/AppProcess";
import type { ProcessControl } from "../apps/AppProcess";
import { Logger } from "../utils/Logger";

const log = new Logger("Kernel");

/** Read-only view of the whole kernel, built on demand. */
export interface KernelSnapshot {
    readonly tick: number;
    readonly uptime: string;
    readonly running: PcbView | null;
    readonly processes: PcbView[];
    readonly memory: MemoryUsage;
    readonly memoryMap: MemorySegment[];
    readonly scheduler: SchedulerStats;
    readonly queue: QueueStatus;
}

export type KernelListener = (snapshot: KernelSnapshot) => void;

export interface LaunchOptions {
    /** Save/cleanup; runs before the PCB reaches TERMINATED. */
    onTerminate?: (reason: string) => void;
    /** Overrides the catalog priority. */
    priority?: number;
}

/**
 * The only mutation surface for applications, parental controls and
 * viewers. Every request returns a `Result`; a rejected request leaves the
 * kernel as it was.
 *
 * Subscribers get a fresh snapshot after every tick and every successful
 * mutation, once the kernel's own work for that call is complete. A tick's
 * subscribers run after the clock has moved on; `tick()` called from inside
 * one is refused.
 */
export class Kernel implements ProcessControl {
    private readonly ctx: KernelContext;
    private readonly memory: MemoryManager;
    private readonly processes: ProcessManager;
    private readonly scheduler: Scheduler;

    private listeners: KernelListener[] = [];

    /** Set from the scheduler's tick work until the tick's subscribers return. */
    private ticking: boolean = false;

    /**
     * @throws KernelError (InvalidConfig) when `options` do not validate
     */
    constructor(options: KernelOptions = {}) {
        this.ctx = createKernelContext(options);
        Logger.setLevel(this.ctx.config.logLevel);
        this.memory = new MemoryManager(this.ctx);
        this.processes = new ProcessManager(this.ctx, this.memory);
        this.scheduler = new Scheduler(this.ctx, this.processes);
        this.ctx.clock.onTick(() => this.onClockTick());
        this.ctx.clock.afterTick(() => this.onTickComplete());

        const c = this.ctx.config;
        log.info(
            `Kernel booted: ${c.totalMemoryKb}KB memory (${c.reservedMemoryKb}KB reserved), ` +
                `quantum ${c.quantumMs}ms, max ${c.maxProcesses} processes`
        );
        this.ctx.activity.record(ActivityCategory.SYSTEM, "Kernel booted");
    }

    get config(): KernelConfig {
        return this.ctx.config;
    }

    // -----------------------------------------------------------------------
    // Process lifecycle
    // -----------------------------------------------------------------------

    spawn(name: string, priority?: number, memoryKb?: number): Result<number> {
        return this.notifyOnSuccess(this.processes.spawn(name, priority, memoryKb));
    }

    /** Spawn a catalog application and hand back its process handle. */
    launch(appId: AppIdType, options: LaunchOptions = {}): Result<AppProcess> {
        const app = APP_CATALOG[appId];
        const spawned = this.processes.spawn(app.id, options.priority ?? app.priority, app.memoryKb);
        if (!spawned.ok) {
            return spawned;
        }

        const pid = spawned.value;
        const onTerminate = options.onTerminate;
        if (onTerminate && this.processes.get(pid)?.state !== ProcessState.TERMINATED) {
            const registered = this.processes.onTerminate(pid, (_pcb, reason) => onTerminate(reason));
            if (!registered.ok) {
                log.error(`Could not register termination hook for ${app.displayName}: ${registered.error.message}`);
            }
        }

        this.notify();
        return ok(new AppProcess(pid, app, this));
    }

    /** Administrative termination (parental lock, app disabled). */
    kill(pid: number, reason: string = "killed"): Result<void> {
        return this.notifyOnSuccess(this.scheduler.terminate(pid, reason));
    }

    /** Normal exit. */
    exit(pid: number): Result<void> {
        return this.kill(pid, "exited");
    }

    /** The application failed; its process ends, the kernel carries on. */
    crash(pid: number, error: unknown): Result<void> {
        const message = error instanceof Error ? error.message : String(error);
        log.error(`PID ${pid} crashed:\n${describeError(error)}`);
        return this.kill(pid, `crashed: ${message}`);
    }

    yield(pid: number): Result<void> {
        return this.notifyOnSuccess(this.scheduler.yield(pid));
    }

    block(pid: number): Result<void> {
        return this.notifyOnSuccess(this.scheduler.block(pid));
    }

    /** Signal the awaited event; applied at the next tick. */
    unblock(pid: number): Result<void> {
        return this.scheduler.requestUnblock(pid);
    }

    setPriority(pid: number, priority: number): Result<void> {
        return this.notifyOnSuccess(this.scheduler.setPriority(pid, priority));
    }

    /** Terminate every live process and stop the clock. */
    shutdown(): void {
        this.stop();
        for (const pcb of this.processes.snapshot()) {
            if (pcb.state === ProcessState.TERMINATED) continue;
            const result = this.scheduler.terminate(pcb.id, "shutdown");
            if (!result.ok) {
                log.error(`Shutdown could not terminate PID ${pcb.id}: ${result.error.message}`);
            }
        }
        this.ctx.activity.record(ActivityCategory.SYSTEM, "Kernel shut down");
        log.info("Kernel shut down");
        this.notify();
    }

    // -----------------------------------------------------------------------
    // Time
    // -----------------------------------------------------------------------

    /**
     * Advance the clock by one tick. `null` if the tick handler failed, or if
     * called while a tick is still being processed (from a subscriber).
     */
    tick(): TickReport | null {
        if (this.ticking) {
            log.warning(`Nested tick() refused: tick ${this.ctx.clock.now - 1} is still being processed`);
            return null;
        }
        const tick = this.ctx.clock.advance();
        const report = this.scheduler.getLastReport();
        return report && report.tick === tick ? report : null;
    }

    /** Drive ticks from a real timer. */
    start(realIntervalMs?: number): void {
        this.ctx.clock.start(realIntervalMs);
        log.info("Clock started");
    }

    get isRunning(): boolean {
        return this.ctx.clock.isRunning;
    }

    stop(): void {
        if (!this.ctx.clock.isRunning) return;
        this.ctx.clock.stop();
        log.info(`Clock stopped at tick ${this.ctx.clock.now}`);
    }

    // -----------------------------------------------------------------------
    // Views
    // -----------------------------------------------------------------------

    snapshot(): KernelSnapshot {
        const running = this.processes.runningPid();
        return {
            tick: this.ctx.clock.now,
            uptime: this.ctx.clock.uptime(),
            running: running !== null ? this.processes.get(running) ?? null : null,
            processes: this.processes.snapshot(),
            memory: this.memory.usage(),
            memoryMap: this.memory.memoryMap(),
            scheduler: this.scheduler.getStats(),
            queue: this.scheduler.getQueueStatus(),
        };
    }

    usage(): MemoryUsage {
        return this.memory.usage();
    }

    getProcess(pid: number): PcbView | undefined {
        return this.processes.get(pid);
    }

    /** KB currently held by `pid` (0 when it holds nothing). */
    processMemory(pid: number): number {
        return this.memory.processMemory(pid);
    }

    schedulerReport(): string {
        return this.scheduler.getReport();
    }

    recentActivity(limit?: number): ActivityEntry[] {
        return this.ctx.activity.recent(limit);
    }

    /** Returns an unsubscribe function. */
    subscribe(listener: KernelListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter((l) => l !== listener);
        };
    }

    // -----------------------------------------------------------------------
    // Internals
    // -----------------------------------------------------------------------

    private onClockTick(): void {
        this.ticking = true;
        const report = this.scheduler.tick();
        this.processes.purgeTerminated(report.tick, this.ctx.config.terminatedRetentionTicks);
    }

    private onTickComplete(): void {
        try {
            this.notify();
        } finally {
            this.ticking = false;
        }
    }

    private notifyOnSuccess<T>(result: Result<T>): Result<T> {
        if (result.ok) {
            this.notify();
        }
        return result;
    }

    private notify(): void {
        if (this.listeners.length === 0) return;
        const snapshot = this.snapshot();
        for (const listener of [...this.listeners]) {
            try {
                listener(snapshot);
            } catch (e: unknown) {
                log.error(`Kernel subscriber failed:\n${describeError(e)}`);
            }
        }
    }
}
