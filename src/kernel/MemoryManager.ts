// ============================================================================
// MemoryManager — First-fit allocation over a simulated address space
// ============================================================================

import _ from "lodash";
import { ActivityCategory } from "./ActivityLog";
import type { KernelContext } from "./KernelContext";
import { KernelErrorKind, fail, ok } from "./KernelError";
import type { Result } from "./KernelError";
import { Logger } from "../utils/Logger";

const log = new Logger("Memory");

export interface MemoryBlock {
    readonly blockId: number;
    readonly ownerProcessId: number;
    /** Label shown in the memory viewer; the owning process's name for spawned apps. */
    readonly name: string;
    readonly sizeKb: number;
    /** Logical start address in KB; always >= the reserved region. */
    readonly offset: number;
    readonly allocatedAt: number;
}

export interface MemoryUsage {
    readonly total: number;
    readonly reserved: number;
    /** KB held by live blocks in the user region (reserved excluded). */
    readonly used: number;
    readonly free: number;
    readonly liveBlocks: number;
}

export const SegmentKind = {
    RESERVED: "reserved",
    ALLOCATED: "allocated",
    FREE: "free",
} as const;

export type SegmentKindType = (typeof SegmentKind)[keyof typeof SegmentKind];

/** One contiguous stretch of the address space, for the memory viewer. */
export interface MemorySegment {
    readonly kind: SegmentKindType;
    readonly start: number;
    readonly end: number;
    readonly sizeKb: number;
    readonly blockId: number | null;
    readonly ownerProcessId: number | null;
    readonly name: string | null;
}

/**
 * Memory layout (defaults):
 *
 *   0 ──────── 256 ─────────────────────────── 1024 KB
 *   │ reserved │ user region (768 KB, first-fit) │
 *
 * The reserved region is never handed out. Blocks are placed at the lowest
 * offset whose gap fits; there is no compaction, so a request can fail with
 * OutOfMemory while enough KB are free in total but scattered.
 */
export class MemoryManager {
    private blocks: Map<number, MemoryBlock> = new Map();

    /** Block ids are never reused; ids below this were issued at some point. */
    private nextBlockId: number = 1;

    /** Single usage counter, updated by every allocate/free. */
    private usedKb: number = 0;

    private readonly totalKb: number;
    private readonly reservedKb: number;

    constructor(private readonly ctx: KernelContext) {
        this.totalKb = ctx.config.totalMemoryKb;
        this.reservedKb = ctx.config.reservedMemoryKb;
        log.debug(
            () => `Memory initialized: ${this.totalKb}KB total, ${this.capacityKb}KB available for apps`
        );
    }

    /** Size of the user region. */
    get capacityKb(): number {
        return this.totalKb - this.reservedKb;
    }

    allocate(processId: number, sizeKb: number, name: string = ""): Result<number> {
        if (!Number.isFinite(sizeKb) || sizeKb <= 0) {
            return fail(KernelErrorKind.INVALID_SIZE, `Invalid allocation size ${sizeKb}KB for PID ${processId}`);
        }

        const freeKb = this.capacityKb - this.usedKb;
        if (sizeKb > freeKb) {
            log.warning(`Allocation failed for PID ${processId}: need ${sizeKb}KB, only ${freeKb}KB free`);
            return fail(
                KernelErrorKind.OUT_OF_MEMORY,
                `PID ${processId} needs ${sizeKb}KB, only ${freeKb}KB free`
            );
        }

        const offset = this.findGap(sizeKb);
        if (offset === null) {
            log.warning(`Allocation failed for PID ${processId}: no contiguous ${sizeKb}KB gap (${freeKb}KB free)`);
            return fail(
                KernelErrorKind.OUT_OF_MEMORY,
                `PID ${processId} needs ${sizeKb}KB contiguous, free space is fragmented`
            );
        }

        const block: MemoryBlock = {
            blockId: this.nextBlockId++,
            ownerProcessId: processId,
            name,
            sizeKb,
            offset,
            allocatedAt: this.ctx.clock.now,
        };
        this.blocks.set(block.blockId, block);
        this.usedKb += sizeKb;

        log.debug(() => `Allocated ${sizeKb}KB for PID ${processId} at address ${offset} (block ${block.blockId})`);
        this.ctx.activity.record(ActivityCategory.MEMORY, `Allocated ${sizeKb}KB for PID ${processId} at address ${offset}`);
        return ok(block.blockId);
    }

    /** Freeing a block twice is a no-op; an id that was never issued is an error. */
    free(blockId: number): Result<void> {
        const block = this.blocks.get(blockId);
        if (!block) {
            if (Number.isInteger(blockId) && blockId >= 1 && blockId < this.nextBlockId) {
                return ok(undefined);
            }
            return fail(KernelErrorKind.UNKNOWN_BLOCK, `Block ${blockId} was never allocated`);
        }

        this.blocks.delete(blockId);
        this.usedKb -= block.sizeKb;

        log.debug(() => `Freed ${block.sizeKb}KB from PID ${block.ownerProcessId} (block ${blockId})`);
        this.ctx.activity.record(ActivityCategory.MEMORY, `Freed ${block.sizeKb}KB from PID ${block.ownerProcessId}`);
        return ok(undefined);
    }

    usage(): MemoryUsage {
        return {
            total: this.totalKb,
            reserved: this.reservedKb,
            used: this.usedKb,
            free: this.capacityKb - this.usedKb,
            liveBlocks: this.blocks.size,
        };
    }

    getBlock(blockId: number): MemoryBlock | undefined {
        return this.blocks.get(blockId);
    }

    /** The live block owned by `processId`, if any. */
    blockOf(processId: number): MemoryBlock | undefined {
        return _.find(Array.from(this.blocks.values()), (b) => b.ownerProcessId === processId);
    }

    /** KB currently held by `processId` (0 when it holds nothing). */
    processMemory(processId: number): number {
        return _.sumBy(
            Array.from(this.blocks.values()).filter((b) => b.ownerProcessId === processId),
            (b) => b.sizeKb
        );
    }

    /** Ordered segments covering the whole address space `[0, total)`. */
    memoryMap(): MemorySegment[] {
        const segments: MemorySegment[] = [];
        if (this.reservedKb > 0) {
            segments.push(segment(SegmentKind.RESERVED, 0, this.reservedKb, null));
        }

        let cursor = this.reservedKb;
        for (const block of this.sortedBlocks()) {
            if (block.offset > cursor) {
                segments.push(segment(SegmentKind.FREE, cursor, block.offset, null));
            }
            segments.push(segment(SegmentKind.ALLOCATED, block.offset, block.offset + block.sizeKb, block));
            cursor = block.offset + block.sizeKb;
        }
        if (cursor < this.totalKb) {
            segments.push(segment(SegmentKind.FREE, cursor, this.totalKb, null));
        }
        return segments;
    }

    // -----------------------------------------------------------------------
    // First-fit
    // -----------------------------------------------------------------------

    private sortedBlocks(): MemoryBlock[] {
        return _.sortBy(Array.from(this.blocks.values()), (b) => b.offset);
    }

    /** Lowest offset in the user region with `sizeKb` contiguous free KB. */
    private findGap(sizeKb: number): number | null {
        let cursor = this.reservedKb;
        for (const block of this.sortedBlocks()) {
            if (block.offset - cursor >= sizeKb) {
                return cursor;
            }
            cursor = block.offset + block.sizeKb;
        }
        return this.totalKb - cursor >= sizeKb ? cursor : null;
    }
}

function segment(kind: SegmentKindType, start: number, end: number, block: MemoryBlock | null): MemorySegment {
    return {
        kind,
        start,
        end,
        sizeKb: end - start,
        blockId: block ? block.blockId : null,
        ownerProcessId: block ? block.ownerProcessId : null,
        name: block ? block.name : null,
    };
}
