// ============================================================================
// Logger.test.ts — Level filtering, lazy messages, delta alerts, throttling
// ============================================================================

import { expect } from "chai";
import { Logger, LogLevel, parseLogLevel } from "../../src/utils/Logger";
import { captureConsole, restoreConsole } from "../helpers";

describe("Logger", () => {
    let logOutput: string[];

    beforeEach(() => {
        logOutput = captureConsole();
    });

    afterEach(() => {
        restoreConsole();
    });

    describe("output format", () => {
        it("should print emoji, level label, tag and message", () => {
            new Logger("Memory").info("Allocated 64KB");
            new Logger("Process").warning("Rejected");
            new Logger("Kernel").error("Boot failed");
            expect(logOutput).to.deep.equal([
                "ℹ️ [INFO] [Memory] Allocated 64KB",
                "⚠️ [WARN] [Process] Rejected",
                "🛑 [ERROR] [Kernel] Boot failed",
            ]);
        });

        it("should treat warn as an alias of warning", () => {
            new Logger("X").warn("careful");
            expect(logOutput).to.deep.equal(["⚠️ [WARN] [X] careful"]);
        });
    });

    describe("level filtering", () => {
        it("should default to INFO and hide DEBUG and TRACE", () => {
            const log = new Logger("Test");
            expect(Logger.getLevel()).to.equal(LogLevel.INFO);
            log.trace("hidden");
            log.debug("hidden");
            log.info("shown");
            expect(logOutput).to.deep.equal(["ℹ️ [INFO] [Test] shown"]);
        });

        it("should show everything at TRACE", () => {
            Logger.setLevel(LogLevel.TRACE);
            const log = new Logger("Test");
            log.trace("t");
            log.debug("d");
            expect(logOutput).to.deep.equal(["🔍 [TRACE] [Test] t", "🐛 [DEBUG] [Test] d"]);
        });

        it("should only show errors at ERROR", () => {
            Logger.setLevel(LogLevel.ERROR);
            const log = new Logger("Test");
            log.info("hidden");
            log.warning("hidden");
            log.error("shown");
            expect(logOutput).to.deep.equal(["🛑 [ERROR] [Test] shown"]);
        });

        it("should share one level across every tag", () => {
            Logger.setLevel(LogLevel.WARNING);
            new Logger("A").info("hidden");
            new Logger("B").info("hidden");
            expect(logOutput).to.have.length(0);
        });
    });

    describe("lazy messages", () => {
        it("should build the message only when it is printed", () => {
            const log = new Logger("Test");
            let built = 0;
            log.debug(() => `expensive ${++built}`);
            log.info(() => `cheap ${++built}`);
            expect(built).to.equal(1);
            expect(logOutput).to.deep.equal(["ℹ️ [INFO] [Test] cheap 1"]);
        });
    });

    describe("alert", () => {
        it("should log only when the value for a key changes", () => {
            const log = new Logger("Scheduler");
            log.alert("cpu", "IDLE");
            log.alert("cpu", "IDLE");
            log.alert("cpu", "PID 3");
            expect(logOutput).to.deep.equal([
                "ℹ️ [INFO] [Scheduler] [Δ] cpu: IDLE",
                "ℹ️ [INFO] [Scheduler] [Δ] cpu: PID 3",
            ]);
        });

        it("should keep keys of different tags apart", () => {
            new Logger("A").alert("state", "x");
            new Logger("B").alert("state", "x");
            expect(logOutput).to.have.length(2);
        });

        it("should respect the level it is given", () => {
            new Logger("A").alert("cpu", "IDLE", LogLevel.DEBUG);
            expect(logOutput).to.have.length(0);
        });

        it("should log again after the delta cache is reset", () => {
            const log = new Logger("A");
            log.alert("cpu", "IDLE");
            Logger.resetDeltaCache();
            log.alert("cpu", "IDLE");
            expect(logOutput).to.have.length(2);
        });
    });

    describe("throttle", () => {
        it("should log only on ticks that are a multiple of the interval", () => {
            const log = new Logger("Test");
            for (let tick = 0; tick < 25; tick++) {
                log.throttle(tick, 10, `tick ${tick}`);
            }
            expect(logOutput).to.deep.equal([
                "ℹ️ [INFO] [Test] tick 0",
                "ℹ️ [INFO] [Test] tick 10",
                "ℹ️ [INFO] [Test] tick 20",
            ]);
        });

        it("should shift the schedule by the offset", () => {
            const log = new Logger("Test");
            log.throttle(7, 10, "off", 3);
            log.throttle(10, 10, "on-tick", 3);
            expect(logOutput).to.deep.equal(["ℹ️ [INFO] [Test] off"]);
        });

        it("should not build a lazy message between intervals", () => {
            const log = new Logger("Test");
            let built = false;
            log.throttle(11, 10, () => {
                built = true;
                return "lazy";
            });
            expect(built).to.equal(false);
        });
    });

    describe("level names", () => {
        it("should parse names case-insensitively, with WARN as an alias", () => {
            expect(parseLogLevel("debug")).to.equal(LogLevel.DEBUG);
            expect(parseLogLevel(" Warn ")).to.equal(LogLevel.WARNING);
            expect(parseLogLevel("TRACE")).to.equal(LogLevel.TRACE);
            expect(parseLogLevel("verbose")).to.equal(undefined);
        });
    });
});
