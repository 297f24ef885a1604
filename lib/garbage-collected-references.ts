import type { TBufferReferenceFactory } from "./buffer-reference.ts";
import { assertIsABufferReference } from "./buffer-checks.ts";

// references go stale only once the garbage collector has reclaimed the buffer
const createGarbageCollectedReferences = (): TBufferReferenceFactory => {

  const createReference: TBufferReferenceFactory["createReference"] = ({ buffer }) => {
    assertIsABufferReference({ buffer });

    const weakRef = new WeakRef(buffer);

    return {
      deref: () => {
        return weakRef.deref();
      }
    };
  };

  return {
    createReference
  };
};

export {
  createGarbageCollectedReferences
};
