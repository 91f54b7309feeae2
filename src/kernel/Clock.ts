// ============================================================================
// Clock — Monotonic tick source that drives the scheduler
// ============================================================================

import { describeError } from "./KernelError";
import { Logger } from "../utils/Logger";

const log = new Logger("Clock");

export type TickHandler = (tick: number) => void;

/**
 * Discrete simulated time. Each tick stands for `intervalMs` simulated
 * milliseconds.
 *
 * Tests call `advance()` directly; a live kernel calls `start()`, which
 * drives `advance()` from a timer. The timer is unref'd, so a running
 * clock alone never keeps the Node process alive.
 */
export class Clock {
    readonly intervalMs: number;

    private _now: number = 0;
    private handlers: TickHandler[] = [];
    private afterHandlers: TickHandler[] = [];
    private timer: NodeJS.Timeout | undefined;

    constructor(intervalMs: number) {
        this.intervalMs = intervalMs;
    }

    /** The tick currently being (or about to be) processed. */
    get now(): number {
        return this._now;
    }

    get uptimeMs(): number {
        return this._now * this.intervalMs;
    }

    /** Simulated uptime as `HH:MM:SS`. */
    uptime(): string {
        const total = Math.floor(this.uptimeMs / 1000);
        const hours = Math.floor(total / 3600);
        const minutes = Math.floor((total % 3600) / 60);
        const seconds = total % 60;
        return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":");
    }

    get isRunning(): boolean {
        return this.timer !== undefined;
    }

    /** Register a handler; returns a function that removes it. */
    onTick(handler: TickHandler): () => void {
        this.handlers.push(handler);
        return () => {
            this.handlers = this.handlers.filter((h) => h !== handler);
        };
    }

    /**
     * Register a handler that runs once the tick is complete and `now` has
     * moved on. It receives the tick that just finished.
     */
    afterTick(handler: TickHandler): () => void {
        this.afterHandlers.push(handler);
        return () => {
            this.afterHandlers = this.afterHandlers.filter((h) => h !== handler);
        };
    }

    /**
     * Invoke every tick handler exactly once with the current tick, advance,
     * then invoke the after-tick handlers. A throwing handler is logged and
     * the remaining handlers still run.
     */
    advance(): number {
        const tick = this._now;
        this.invoke(this.handlers, tick, "Tick handler");
        this._now = tick + 1;
        this.invoke(this.afterHandlers, tick, "After-tick handler");
        return tick;
    }

    /** Drive `advance()` in real time, one tick every `realIntervalMs`. */
    start(realIntervalMs: number = this.intervalMs): void {
        if (this.timer) return;
        this.timer = setInterval(() => this.advance(), realIntervalMs);
        this.timer.unref();
        log.debug(`Clock started (${realIntervalMs}ms per tick)`);
    }

    stop(): void {
        if (!this.timer) return;
        clearInterval(this.timer);
        this.timer = undefined;
        log.debug(`Clock stopped at tick ${this._now}`);
    }

    private invoke(handlers: TickHandler[], tick: number, what: string): void {
        for (const handler of [...handlers]) {
            try {
                handler(tick);
            } catch (e: unknown) {
                log.error(`${what} failed on tick ${tick}:\n${describeError(e)}`);
            }
        }
    }
}
