import nodeAssert from "node:assert";
import { createReleaseTrackingReferences } from "../lib/release-tracking-references.ts";

describe("release-tracking-references", () => {
  describe("createReference", () => {
    it("should deref to the buffer until it is released", () => {
      const references = createReleaseTrackingReferences();
      const buffer = { bufferId: "a" };

      const reference = references.createReference({ buffer });
      nodeAssert.strictEqual(reference.deref(), buffer);

      references.release({ buffer });
      nodeAssert.strictEqual(reference.deref(), undefined);
    });

    it("should make references created after release stale as well", () => {
      const references = createReleaseTrackingReferences();
      const buffer = { bufferId: "a" };

      references.release({ buffer });
      const reference = references.createReference({ buffer });

      nodeAssert.strictEqual(reference.deref(), undefined);
    });

    it("should not affect references to other buffers", () => {
      const references = createReleaseTrackingReferences();
      const a = { bufferId: "a" };
      const b = { bufferId: "b" };

      const referenceToB = references.createReference({ buffer: b });
      references.release({ buffer: a });

      nodeAssert.strictEqual(referenceToB.deref(), b);
    });
  });

  describe("release", () => {
    it("should mark the buffer as released", () => {
      const references = createReleaseTrackingReferences();
      const buffer = { bufferId: "a" };

      nodeAssert.strictEqual(references.isReleased({ buffer }), false);
      references.release({ buffer });
      nodeAssert.strictEqual(references.isReleased({ buffer }), true);
    });

    it("should throw when a buffer is released twice", () => {
      const references = createReleaseTrackingReferences();
      const buffer = { bufferId: "a" };

      references.release({ buffer });

      nodeAssert.throws(() => {
        references.release({ buffer });
      }, /buffer already released/);
    });
  });
});
