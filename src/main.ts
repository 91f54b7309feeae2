#!/usr/bin/env node
// ============================================================================
// Main — Boots a kernel from config/kernel.json and runs a demo session
// ============================================================================

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppId } from "./apps/AppCatalog";
import type { AppProcess } from "./apps/AppProcess";
import { Kernel } from "./kernel/Kernel";
import { parseKernelOptions } from "./kernel/KernelConfig";
import type { KernelOptions } from "./kernel/KernelConfig";
import { describeError } from "./kernel/KernelError";
import type { Result } from "./kernel/KernelError";
import { reporting } from "./reporting";
import { Logger } from "./utils/Logger";

const log = new Logger("OS");

const DEFAULT_CONFIG_PATH = "config/kernel.json";
const DEFAULT_TICKS = 12;

interface CliArgs {
    configPath: string;
    ticks: number;
}

function parseArgs(argv: string[]): CliArgs {
    const args: CliArgs = { configPath: DEFAULT_CONFIG_PATH, ticks: DEFAULT_TICKS };
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === "--ticks") {
            const n = Number(argv[++i]);
            if (Number.isInteger(n) && n > 0) args.ticks = n;
            else log.warning(`Ignoring --ticks ${argv[i]}: expected a positive integer`);
        } else {
            args.configPath = arg;
        }
    }
    return args;
}

function loadOptions(path: string): KernelOptions {
    const file = resolve(path);
    if (!existsSync(file)) {
        log.warning(`No configuration at ${file}, using defaults`);
        return {};
    }
    const { options, unknownKeys } = parseKernelOptions(JSON.parse(readFileSync(file, "utf8")));
    for (const key of unknownKeys) {
        log.warning(`Unknown configuration key "${key}" ignored`);
    }
    log.info(`Loaded configuration from ${file}`);
    return options;
}

function report<T>(what: string, result: Result<T>): void {
    if (!result.ok) {
        log.warning(`${what} rejected: ${result.error.toString()}`);
    }
}

function runTicks(kernel: Kernel, count: number): void {
    for (let i = 0; i < count; i++) {
        kernel.tick();
    }
}

/**
 * A short session: three apps share the CPU, music waits for input and
 * is woken, drawing crashes, stories exits, then the parent panel opens.
 */
function demo(kernel: Kernel, ticks: number): void {
    const apps: AppProcess[] = [];
    for (const id of [AppId.DRAWING, AppId.STORIES, AppId.MUSIC]) {
        const launched = kernel.launch(id, {
            onTerminate: (reason) => log.info(`${id} saved its work (${reason})`),
        });
        if (launched.ok) apps.push(launched.value);
        else report(`Launch ${id}`, launched);
    }
    const [drawing, stories, music] = apps;

    runTicks(kernel, Math.ceil(ticks / 3));
    if (music) {
        // Waiting for input is only possible while on the CPU
        for (let i = 0; i < ticks && music.isAlive && kernel.snapshot().running?.id !== music.pid; i++) {
            kernel.tick();
        }
        report("Block music", music.block());
    }

    runTicks(kernel, Math.ceil(ticks / 3));
    if (music) report("Unblock music", music.unblock());
    if (drawing) report("Crash drawing", drawing.crash(new Error("brush not found")));
    if (stories) report("Exit stories", stories.exit());
    report("Launch parent panel", kernel.launch(AppId.PARENT_PANEL));

    runTicks(kernel, Math.ceil(ticks / 3));

    const snapshot = kernel.snapshot();
    console.log(reporting.summary(snapshot));
    console.log(reporting.processTable(snapshot));
    console.log(reporting.memoryMap(snapshot));
    console.log(kernel.schedulerReport());
    console.log(reporting.activity(kernel.recentActivity(15)));
}

export function main(argv: string[] = process.argv.slice(2)): number {
    const args = parseArgs(argv);
    let kernel: Kernel;
    try {
        kernel = new Kernel(loadOptions(args.configPath));
    } catch (e: unknown) {
        log.error(`Boot failed:\n${describeError(e)}`);
        return 1;
    }

    demo(kernel, args.ticks);
    kernel.shutdown();
    return 0;
}

if (require.main === module) {
    process.exitCode = main();
}
