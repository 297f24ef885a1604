import nodeAssert from "node:assert";
import { assertIsABufferReference, isABufferReference } from "../lib/buffer-checks.ts";

describe("buffer-checks", () => {
  describe("isABufferReference", () => {
    it("should accept objects and functions", () => {
      nodeAssert.strictEqual(isABufferReference({ buffer: {} }), true);
      nodeAssert.strictEqual(isABufferReference({ buffer: new Uint8Array(4) }), true);
      nodeAssert.strictEqual(isABufferReference({ buffer: () => { } }), true);
    });

    it("should reject primitives", () => {
      [null, undefined, 42, "buffer", 7n, true].forEach((buffer) => {
        nodeAssert.strictEqual(isABufferReference({ buffer }), false);
      });
    });
  });

  describe("assertIsABufferReference", () => {
    it("should throw for primitives", () => {
      nodeAssert.throws(() => {
        assertIsABufferReference({ buffer: 42 });
      }, /invalid buffer 42, expected an object reference/);
    });

    it("should not throw for objects", () => {
      nodeAssert.doesNotThrow(() => {
        assertIsABufferReference({ buffer: {} });
      });
    });
  });
});
