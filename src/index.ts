// ============================================================================
// Public API
// ============================================================================

export { Kernel } from "./kernel/Kernel";
export type { KernelListener, KernelSnapshot, LaunchOptions } from "./kernel/Kernel";
export { Clock } from "./kernel/Clock";
export type { TickHandler } from "./kernel/Clock";
export { MemoryManager, SegmentKind } from "./kernel/MemoryManager";
export type { MemoryBlock, MemorySegment, MemoryUsage } from "./kernel/MemoryManager";
export { ProcessManager } from "./kernel/ProcessManager";
export type { PcbView, TerminationHook, TransitionEvent, TransitionListener } from "./kernel/ProcessManager";
export { Scheduler, pickNextProcess } from "./kernel/Scheduler";
export type { QueueStatus, SchedulerStats, SchedulingCandidate, TickReport } from "./kernel/Scheduler";
export { ProcessState, TRANSITIONS, canTransition } from "./kernel/ProcessState";
export type { ProcessStateType } from "./kernel/ProcessState";
export { KernelError, KernelErrorKind, fail, ok } from "./kernel/KernelError";
export type { KernelErrorKindType, Result } from "./kernel/KernelError";
export { DEFAULT_OPTIONS, MAX_PRIORITY, MIN_PRIORITY, parseKernelOptions, resolveConfig } from "./kernel/KernelConfig";
export type { KernelConfig, KernelOptions } from "./kernel/KernelConfig";
export { createKernelContext } from "./kernel/KernelContext";
export type { KernelContext } from "./kernel/KernelContext";
export { ActivityCategory, ActivityLog } from "./kernel/ActivityLog";
export type { ActivityEntry } from "./kernel/ActivityLog";
export { APP_CATALOG, AppId, isAppId } from "./apps/AppCatalog";
export type { AppDescriptor, AppIdType } from "./apps/AppCatalog";
export { AppProcess } from "./apps/AppProcess";
export type { ProcessControl } from "./apps/AppProcess";
export { reporting } from "./reporting";
export { Logger, LogLevel } from "./utils/Logger";
export type { LogLevelType } from "./utils/Logger";
