// ============================================================================
// ActivityLog — Bounded record of kernel events for parent review
// ============================================================================

import type { Clock } from "./Clock";

export const ActivityCategory = {
    PROCESS: "PROCESS",
    MEMORY: "MEMORY",
    SCHEDULER: "SCHEDULER",
    SYSTEM: "SYSTEM",
} as const;

export type ActivityCategoryType = (typeof ActivityCategory)[keyof typeof ActivityCategory];

export interface ActivityEntry {
    readonly tick: number;
    readonly category: ActivityCategoryType;
    readonly details: string;
}

/**
 * The kernel's side of the activity-log collaborator: termination reasons,
 * allocations and frees land here. Only the newest `limit` entries are kept.
 */
export class ActivityLog {
    private entries: ActivityEntry[] = [];

    constructor(private readonly clock: Clock, private readonly limit: number) {}

    record(category: ActivityCategoryType, details: string): void {
        this.entries.push({ tick: this.clock.now, category, details });
        if (this.entries.length > this.limit) {
            this.entries.splice(0, this.entries.length - this.limit);
        }
    }

    /** Newest first. */
    recent(limit: number = 50): ActivityEntry[] {
        return this.entries.slice(-limit).reverse();
    }

    /** Newest first, filtered by category. */
    byCategory(category: ActivityCategoryType, limit: number = 50): ActivityEntry[] {
        return this.entries.filter((e) => e.category === category).slice(-limit).reverse();
    }

    get size(): number {
        return this.entries.length;
    }

    clear(): void {
        this.entries = [];
    }
}
