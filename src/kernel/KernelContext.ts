// ============================================================================
// KernelContext — The state shared by every component of one kernel
// ============================================================================

import { ActivityLog } from "./ActivityLog";
import { Clock } from "./Clock";
import { resolveConfig } from "./KernelConfig";
import type { KernelConfig, KernelOptions } from "./KernelConfig";

/**
 * Passed explicitly to each component constructor. There are no module-level
 * singletons, so any number of kernels can live side by side (one per test).
 */
export interface KernelContext {
    readonly config: KernelConfig;
    readonly clock: Clock;
    readonly activity: ActivityLog;
}

export function createKernelContext(options: KernelOptions = {}): KernelContext {
    const config = resolveConfig(options);
    const clock = new Clock(config.tickMs);
    const activity = new ActivityLog(clock, config.activityLogLimit);
    return { config, clock, activity };
}
