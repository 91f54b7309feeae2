// ============================================================================
// KernelError.test.ts — Error values and the Result helpers
// ============================================================================

import { expect } from "chai";
import { describeError, fail, KernelError, KernelErrorKind, ok } from "../../src/kernel/KernelError";

describe("KernelError", () => {
    it("should carry its kind and print it before the message", () => {
        const error = new KernelError(KernelErrorKind.OUT_OF_MEMORY, "no room for 700KB");
        expect(error).to.be.instanceOf(Error);
        expect(error.name).to.equal("KernelError");
        expect(error.kind).to.equal("OutOfMemory");
        expect(error.toString()).to.equal("OutOfMemory: no room for 700KB");
    });

    it("should wrap values and errors in results", () => {
        expect(ok(3)).to.deep.equal({ ok: true, value: 3 });

        const failed = fail(KernelErrorKind.UNKNOWN_PROCESS, "PID 9 does not exist");
        expect(failed.ok).to.equal(false);
        if (!failed.ok) {
            expect(failed.error.kind).to.equal("UnknownProcess");
            expect(failed.error.message).to.equal("PID 9 does not exist");
        }
    });

    it("should describe thrown non-errors as strings", () => {
        expect(describeError("plain")).to.equal("plain");
        expect(describeError(42)).to.equal("42");
        expect(describeError(new Error("boom"))).to.contain("boom");
    });
});
