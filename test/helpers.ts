// ============================================================================
// helpers.ts — Shared test utilities: console capture and Result unwrapping
// ============================================================================

import { Kernel } from "../src/kernel/Kernel";
import type { KernelOptions } from "../src/kernel/KernelConfig";
import { createKernelContext } from "../src/kernel/KernelContext";
import type { KernelContext } from "../src/kernel/KernelContext";
import type { KernelError, Result } from "../src/kernel/KernelError";
import type { TickReport } from "../src/kernel/Scheduler";
import { Logger } from "../src/utils/Logger";

let originalLog: typeof console.log = console.log;

/**
 * Route console.log into an array until `restoreConsole()`. Also resets the
 * global Logger state so each test starts from INFO with an empty delta cache.
 */
export function captureConsole(): string[] {
    const lines: string[] = [];
    originalLog = console.log;
    console.log = (...args: unknown[]) => {
        lines.push(args.map(String).join(" "));
    };
    Logger.resetLevel();
    Logger.resetDeltaCache();
    return lines;
}

export function restoreConsole(): void {
    console.log = originalLog;
    Logger.resetLevel();
}

export function makeContext(options: KernelOptions = {}): KernelContext {
    return createKernelContext(options);
}

export function makeKernel(options: KernelOptions = {}): Kernel {
    return new Kernel(options);
}

/** The value of a successful result; fails the test otherwise. */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
        throw new Error(`Expected success, got ${result.error.toString()}`);
    }
    return result.value;
}

/** The error of a failed result; fails the test otherwise. */
export function unwrapErr<T>(result: Result<T>): KernelError {
    if (result.ok) {
        throw new Error(`Expected failure, got ${JSON.stringify(result.value)}`);
    }
    return result.error;
}

export function runTicks(kernel: Kernel, count: number): TickReport[] {
    const reports: TickReport[] = [];
    for (let i = 0; i < count; i++) {
        const report = kernel.tick();
        if (!report) throw new Error(`Tick ${i} produced no report`);
        reports.push(report);
    }
    return reports;
}

/** Deterministic pseudo-random sequence for property-style tests. */
export function lcg(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 0x100000000;
    };
}
