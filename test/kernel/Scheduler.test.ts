// ============================================================================
// Scheduler.test.ts — Priority round robin, quantum expiry, tick ordering
// ============================================================================

import { expect } from "chai";
import type { KernelOptions } from "../../src/kernel/KernelConfig";
import type { KernelContext } from "../../src/kernel/KernelContext";
import { KernelErrorKind } from "../../src/kernel/KernelError";
import { MemoryManager } from "../../src/kernel/MemoryManager";
import { ProcessManager } from "../../src/kernel/ProcessManager";
import { ProcessState } from "../../src/kernel/ProcessState";
import { pickNextProcess, Scheduler } from "../../src/kernel/Scheduler";
import type { TickReport } from "../../src/kernel/Scheduler";
import { captureConsole, lcg, makeContext, restoreConsole, unwrap, unwrapErr } from "../helpers";

describe("pickNextProcess", () => {
    it("should prefer the highest priority", () => {
        const next = pickNextProcess([
            { id: 1, priority: 3, scheduleOrder: 1 },
            { id: 2, priority: 5, scheduleOrder: 2 },
        ]);
        expect(next?.id).to.equal(2);
    });

    it("should prefer the longest-waiting process among equal priorities", () => {
        const next = pickNextProcess([
            { id: 1, priority: 3, scheduleOrder: 5 },
            { id: 2, priority: 3, scheduleOrder: 2 },
        ]);
        expect(next?.id).to.equal(2);
    });

    it("should fall back to the lowest id", () => {
        const next = pickNextProcess([
            { id: 3, priority: 3, scheduleOrder: 1 },
            { id: 2, priority: 3, scheduleOrder: 1 },
        ]);
        expect(next?.id).to.equal(2);
    });

    it("should pass over the excluded process unless it is the only one", () => {
        const candidates = [
            { id: 1, priority: 5, scheduleOrder: 1 },
            { id: 2, priority: 3, scheduleOrder: 2 },
        ];
        expect(pickNextProcess(candidates, 1)?.id).to.equal(2);
        expect(pickNextProcess([candidates[0]], 1)?.id).to.equal(1);
    });

    it("should return null for an empty queue", () => {
        expect(pickNextProcess([])).to.equal(null);
    });
});

describe("Scheduler", () => {
    let ctx: KernelContext;
    let pm: ProcessManager;
    let scheduler: Scheduler;

    function setup(options: KernelOptions = {}): void {
        ctx = makeContext(options);
        pm = new ProcessManager(ctx, new MemoryManager(ctx));
        scheduler = new Scheduler(ctx, pm);
    }

    /** One tick, then advance the clock the way the Kernel does. */
    function step(): TickReport {
        const report = scheduler.tick();
        ctx.clock.advance();
        return report;
    }

    function spawn(name: string, priority: number, memoryKb: number = 10): number {
        return unwrap(pm.spawn(name, priority, memoryKb));
    }

    beforeEach(() => {
        captureConsole();
        setup();
    });

    afterEach(() => {
        restoreConsole();
    });

    describe("tick", () => {
        it("should idle with an empty ready queue", () => {
            expect(step()).to.deep.equal({
                tick: 0,
                ran: null,
                expired: null,
                unblocked: [],
                dispatched: null,
                idle: true,
            });
        });

        it("should not dispatch on spawn, only on the next tick", () => {
            const a = spawn("a", 3);
            expect(pm.get(a)?.state).to.equal(ProcessState.READY);
            expect(step().dispatched).to.equal(a);
            expect(pm.get(a)?.state).to.equal(ProcessState.RUNNING);
        });

        it("should run the higher-priority process first, then hand over on expiry", () => {
            const a = spawn("A", 3, 100);
            const b = spawn("B", 5, 50);

            expect(step().dispatched).to.equal(b);

            const second = step();
            expect(second.ran).to.equal(b);
            expect(second.expired).to.equal(b);
            expect(second.dispatched).to.equal(a);
            expect(pm.get(b)?.state).to.equal(ProcessState.READY);
            expect(pm.get(a)?.state).to.equal(ProcessState.RUNNING);
        });

        it("should keep a process on the CPU until its quantum is used up", () => {
            setup({ quantum_ms: 100, tick_ms: 50 });
            const a = spawn("a", 3);
            const b = spawn("b", 3);

            expect(step().dispatched).to.equal(a);

            const second = step();
            expect(second.ran).to.equal(a);
            expect(second.expired).to.equal(null);
            expect(second.dispatched).to.equal(null);
            expect(pm.get(a)?.quantumRemaining).to.equal(50);

            const third = step();
            expect(third.expired).to.equal(a);
            expect(third.dispatched).to.equal(b);
        });

        it("should expire, then unblock, then dispatch within one tick", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 3);
            step(); // a runs
            unwrap(scheduler.block(a)); // b takes over at once
            unwrap(scheduler.requestUnblock(a));

            expect(step()).to.deep.equal({
                tick: 1,
                ran: b,
                expired: b,
                unblocked: [a],
                dispatched: a,
                idle: false,
            });
        });

        it("should apply unblock events in arrival order", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 3);
            step();
            unwrap(scheduler.block(a));
            unwrap(scheduler.block(b));

            unwrap(scheduler.requestUnblock(b));
            unwrap(scheduler.requestUnblock(a));
            expect(step().unblocked).to.deep.equal([b, a]);
        });
    });

    describe("fairness", () => {
        it("should dispatch each equal-priority process once before any runs twice", () => {
            const pids = [spawn("p1", 3), spawn("p2", 3), spawn("p3", 3), spawn("p4", 3)];
            const order: number[] = [];
            for (let i = 0; i < 8; i++) {
                const dispatched = step().dispatched;
                if (dispatched !== null) order.push(dispatched);
            }
            expect(order).to.deep.equal([...pids, ...pids]);
        });

        it("should pick a newly READY higher-priority process at the next decision", () => {
            const low1 = spawn("low1", 2);
            spawn("low2", 2);
            expect(step().dispatched).to.equal(low1);

            const high = spawn("high", 4);
            expect(step().dispatched).to.equal(high);
        });

        it("should redispatch the only READY process after its quantum expires", () => {
            const a = spawn("a", 3);
            step();
            const second = step();
            expect(second.expired).to.equal(a);
            expect(second.dispatched).to.equal(a);
            expect(pm.get(a)?.dispatchCount).to.equal(2);
        });
    });

    describe("requests", () => {
        it("should yield to the next READY process immediately", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 3);
            step();

            unwrap(scheduler.yield(a));
            expect(pm.get(a)?.state).to.equal(ProcessState.READY);
            expect(pm.runningPid()).to.equal(b);
        });

        it("should reject a yield from a process that is not RUNNING", () => {
            const a = spawn("a", 3);
            expect(unwrapErr(scheduler.yield(a)).kind).to.equal(KernelErrorKind.INVALID_TRANSITION);
            expect(unwrapErr(scheduler.yield(99)).kind).to.equal(KernelErrorKind.UNKNOWN_PROCESS);
        });

        it("should block the RUNNING process and dispatch another immediately", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 3);
            step();

            unwrap(scheduler.block(a));
            expect(pm.get(a)?.state).to.equal(ProcessState.WAITING);
            expect(pm.runningPid()).to.equal(b);
        });

        it("should validate unblock requests and fold duplicates", () => {
            const a = spawn("a", 3);
            expect(unwrapErr(scheduler.requestUnblock(a)).kind).to.equal(KernelErrorKind.INVALID_TRANSITION);
            expect(unwrapErr(scheduler.requestUnblock(42)).kind).to.equal(KernelErrorKind.UNKNOWN_PROCESS);

            step();
            unwrap(scheduler.block(a));
            unwrap(scheduler.requestUnblock(a));
            unwrap(scheduler.requestUnblock(a));
            expect(scheduler.getQueueStatus().pendingUnblocks).to.deep.equal([a]);
            expect(pm.get(a)?.state).to.equal(ProcessState.WAITING);
        });

        it("should drop a pending unblock when the process is killed first", () => {
            const a = spawn("a", 3);
            step();
            unwrap(scheduler.block(a));
            unwrap(scheduler.requestUnblock(a));
            unwrap(scheduler.terminate(a, "killed"));

            expect(step().unblocked).to.deep.equal([]);
        });

        it("should refill the CPU when the RUNNING process is terminated", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 3);
            step();

            unwrap(scheduler.terminate(a, "killed"));
            expect(pm.runningPid()).to.equal(b);
        });

        it("should re-evaluate the queue when a queued process is gone", () => {
            const a = spawn("a", 5);
            const b = spawn("b", 3);
            unwrap(pm.terminate(a, "killed"));

            expect(step().dispatched).to.equal(b);
        });

        it("should move a READY process to its new priority bucket", () => {
            const a = spawn("a", 3);
            unwrap(scheduler.setPriority(a, 5));
            const status = scheduler.getQueueStatus();
            expect(status.ready[5]).to.deep.equal([a]);
            expect(status.ready[3]).to.deep.equal([]);
        });
    });

    describe("queries", () => {
        it("should list READY processes per priority level", () => {
            const a = spawn("a", 3);
            const b = spawn("b", 5);
            const c = spawn("c", 3);
            expect(scheduler.getQueueStatus()).to.deep.equal({
                running: null,
                ready: { 1: [], 2: [], 3: [a, c], 4: [], 5: [b] },
                waiting: [],
                pendingUnblocks: [],
            });
        });

        it("should count busy and idle ticks, dispatches and context switches", () => {
            const a = spawn("a", 3);
            step(); // dispatch a
            step(); // a expires and is the only candidate
            unwrap(scheduler.terminate(a, "exited"));
            step(); // idle

            const stats = scheduler.getStats();
            expect(stats.ticks).to.equal(3);
            expect(stats.busyTicks).to.equal(2);
            expect(stats.idleTicks).to.equal(1);
            expect(stats.dispatches).to.equal(2);
            expect(stats.contextSwitches).to.equal(0);
            expect(stats.cpuUtilization).to.be.closeTo(66.67, 0.01);
        });

        it("should count a context switch when another process takes the CPU", () => {
            spawn("a", 3);
            spawn("b", 3);
            step();
            step();
            expect(scheduler.getStats().contextSwitches).to.equal(1);
        });

        it("should format a report of the running process and the queue", () => {
            spawn("a", 3);
            const b = spawn("b", 3);
            step();

            const lines = scheduler.getReport().split("\n");
            expect(lines).to.include("--- ⚙️ SCHEDULER (Tick 1) ---");
            expect(lines).to.include("Running: PID 1 (a) [P3] | Quantum left: 100ms");
            expect(lines).to.include("Ticks: 1 (1 busy, 0 idle) | CPU: 100.0%");
            expect(lines).to.include("Dispatches: 1 | Context switches: 0");
            expect(lines).to.include(`  P3 █ ${b}`);
        });
    });

    describe("invariants", () => {
        it("should never have more than one RUNNING process across random operations", () => {
            const random = lcg(7);
            for (let i = 0; i < 400; i++) {
                const live = pm.snapshot().filter((p) => p.state !== ProcessState.TERMINATED);
                const target = live.length > 0 ? live[Math.floor(random() * live.length)].id : 0;
                const roll = random();

                if (roll < 0.2) pm.spawn(`p${i}`, 1 + Math.floor(random() * 5), 1 + Math.floor(random() * 120));
                else if (roll < 0.3) scheduler.terminate(target, "killed");
                else if (roll < 0.4) scheduler.block(target);
                else if (roll < 0.5) scheduler.requestUnblock(target);
                else if (roll < 0.6) scheduler.yield(target);
                else step();

                const running = pm.snapshot().filter((p) => p.state === ProcessState.RUNNING);
                expect(running.length).to.be.at.most(1);
                expect(pm.runningPid()).to.equal(running.length === 1 ? running[0].id : null);
            }
        });
    });
});
