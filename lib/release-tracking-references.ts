import type { TBufferReferenceFactory } from "./buffer-reference.ts";
import { assertIsABufferReference } from "./buffer-checks.ts";

type TReleaseTrackingReferences = TBufferReferenceFactory & {
  release: (args: { buffer: object }) => void;
  isReleased: (args: { buffer: object }) => boolean;
};

/**
 * Reference factory for owners that destroy buffers explicitly, e.g. by
 * closing a handle, instead of dropping them. Once a buffer is released,
 * every reference to it derefs to undefined, even while the object itself
 * is still reachable elsewhere.
 *
 * Neither the references nor the release bookkeeping keep buffers alive.
 */
const createReleaseTrackingReferences = (): TReleaseTrackingReferences => {

  const releasedBuffers = new WeakSet<object>();

  const createReference: TReleaseTrackingReferences["createReference"] = ({ buffer }) => {
    assertIsABufferReference({ buffer });

    const weakRef = new WeakRef(buffer);

    const deref = () => {
      const target = weakRef.deref();

      if (target === undefined || releasedBuffers.has(target)) {
        return undefined;
      }

      return target;
    };

    return {
      deref
    };
  };

  const release: TReleaseTrackingReferences["release"] = ({ buffer }) => {
    assertIsABufferReference({ buffer });

    if (releasedBuffers.has(buffer)) {
      throw Error("buffer already released");
    }

    releasedBuffers.add(buffer);
  };

  const isReleased: TReleaseTrackingReferences["isReleased"] = ({ buffer }) => {
    return releasedBuffers.has(buffer);
  };

  return {
    createReference,
    release,
    isReleased
  };
};

export {
  createReleaseTrackingReferences
};

export type {
  TReleaseTrackingReferences
};
