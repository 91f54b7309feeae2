// ============================================================================
// Reporting — Text views of a kernel snapshot for the console viewers
// ============================================================================

import _ from "lodash";
import type { ActivityEntry } from "./kernel/ActivityLog";
import type { KernelSnapshot } from "./kernel/Kernel";
import { SegmentKind } from "./kernel/MemoryManager";
import type { MemorySegment } from "./kernel/MemoryManager";
import { ALL_STATES, ProcessState } from "./kernel/ProcessState";

/** Width of the memory bar in characters. */
const BAR_WIDTH = 32;

const SEGMENT_GLYPH: Record<string, string> = {
    [SegmentKind.RESERVED]: "▓",
    [SegmentKind.ALLOCATED]: "█",
    [SegmentKind.FREE]: "░",
};

function percent(part: number, whole: number): string {
    return whole === 0 ? "0.0%" : `${((part / whole) * 100).toFixed(1)}%`;
}

export const reporting = {
    /** One status line: tick, uptime, process states, memory. */
    summary(snapshot: KernelSnapshot): string {
        const live = snapshot.processes.filter((p) => p.state !== ProcessState.TERMINATED);
        const byState = _.countBy(live, (p) => p.state);
        const states = ALL_STATES.filter((s) => byState[s])
            .map((s) => `${s}: ${byState[s]}`)
            .join(", ");
        const m = snapshot.memory;
        const capacity = m.total - m.reserved;
        return (
            `[Tick ${snapshot.tick}] Uptime ${snapshot.uptime} | ` +
            `Processes: ${live.length}${states ? ` (${states})` : ""} | ` +
            `Memory: ${m.used}/${capacity}KB (${percent(m.used, capacity)}) | ` +
            `CPU: ${snapshot.scheduler.cpuUtilization.toFixed(1)}%`
        );
    },

    /** Process viewer: one row per PCB, ordered by PID. */
    processTable(snapshot: KernelSnapshot): string {
        const lines = [
            `${"PID".padStart(4)}  ${"NAME".padEnd(14)}${"STATE".padEnd(12)}${"PRI".padStart(3)}  ${"MEM".padStart(6)}  ${"CPU".padStart(8)}`,
        ];
        for (const p of snapshot.processes) {
            const marker = p.id === snapshot.running?.id ? "▶" : " ";
            lines.push(
                `${String(p.id).padStart(4)}${marker} ${p.name.padEnd(14)}${p.state.padEnd(12)}` +
                    `${String(p.priority).padStart(3)}  ${`${p.memoryKb}KB`.padStart(6)}  ${`${p.cpuTimeMs}ms`.padStart(8)}`
            );
        }
        if (snapshot.processes.length === 0) {
            lines.push("  (no processes)");
        }
        return lines.join("\n");
    },

    /** Memory viewer: a proportional bar plus one line per segment. */
    memoryMap(snapshot: KernelSnapshot): string {
        const segments = snapshot.memoryMap;
        const total = snapshot.memory.total;
        const lines = [`${memoryBar(segments, total)}  ${snapshot.memory.used}KB used, ${snapshot.memory.free}KB free`];
        for (const s of segments) {
            const range = `[${String(s.start).padStart(5)} - ${String(s.end).padStart(5)})`;
            const label = s.name ? ` (${s.name})` : "";
            const owner = s.kind === SegmentKind.ALLOCATED ? ` block ${s.blockId} PID ${s.ownerProcessId}${label}` : "";
            lines.push(`  ${range} ${s.kind.padEnd(9)} ${`${s.sizeKb}KB`.padStart(6)}${owner}`);
        }
        return lines.join("\n");
    },

    /** Activity log, newest first. */
    activity(entries: ActivityEntry[]): string {
        return entries.map((e) => `  [${e.tick}] ${e.category}: ${e.details}`).join("\n");
    },
};

/** Each cell takes the glyph of the segment that contains its first KB. */
function memoryBar(segments: MemorySegment[], total: number): string {
    const cell = total / BAR_WIDTH;
    let bar = "";
    for (let i = 0; i < BAR_WIDTH; i++) {
        const address = i * cell;
        const seg = _.find(segments, (s) => address >= s.start && address < s.end);
        bar += seg ? SEGMENT_GLYPH[seg.kind] : " ";
    }
    return bar;
}
