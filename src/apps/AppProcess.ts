// ============================================================================
// AppProcess — What a launched application holds on to
// ============================================================================

import type { AppDescriptor } from "./AppCatalog";
import type { Result } from "../kernel/KernelError";
import type { PcbView } from "../kernel/ProcessManager";
import { ProcessState } from "../kernel/ProcessState";
import type { ProcessStateType } from "../kernel/ProcessState";

/** The kernel operations an application may call on its own PCB. */
export interface ProcessControl {
    yield(pid: number): Result<void>;
    block(pid: number): Result<void>;
    unblock(pid: number): Result<void>;
    exit(pid: number): Result<void>;
    crash(pid: number, error: unknown): Result<void>;
    getProcess(pid: number): PcbView | undefined;
}

/**
 * Handle returned by `Kernel.launch()`. Every application gets the same
 * fixed capability set: yield, block/unblock around a wait, exit, crash.
 */
export class AppProcess {
    constructor(
        readonly pid: number,
        readonly app: AppDescriptor,
        private readonly control: ProcessControl
    ) {}

    /** `undefined` once the PCB has been purged. */
    get state(): ProcessStateType | undefined {
        return this.control.getProcess(this.pid)?.state;
    }

    get isAlive(): boolean {
        const state = this.state;
        return state !== undefined && state !== ProcessState.TERMINATED;
    }

    yield(): Result<void> {
        return this.control.yield(this.pid);
    }

    /** Wait for input; the CPU goes to another process at once. */
    block(): Result<void> {
        return this.control.block(this.pid);
    }

    /** Signal the awaited event; the PCB is READY again after the next tick. */
    unblock(): Result<void> {
        return this.control.unblock(this.pid);
    }

    exit(): Result<void> {
        return this.control.exit(this.pid);
    }

    crash(error: unknown): Result<void> {
        return this.control.crash(this.pid, error);
    }

    toString(): string {
        return `${this.app.icon} ${this.app.displayName} (PID ${this.pid})`;
    }
}
