import type { TBufferReferenceFactory } from "./buffer-reference.ts";
import { createGarbageCollectedReferences } from "./garbage-collected-references.ts";
import { assertCapacityIsValid, createSlotCache } from "./slot-cache.ts";
import type { TSlotCache, TSlotResolution } from "./slot-cache.ts";
import { NUM_BUFFER_SLOTS } from "./constants.ts";

type TSlotCacheRegistry<TTargetId, TBuffer extends object> = {
  cacheFor: (args: { targetId: TTargetId }) => TSlotCache<TBuffer>;
  resolve: (args: { targetId: TTargetId, buffer: TBuffer }) => TSlotResolution<TBuffer>;
  remove: (args: { targetId: TTargetId }) => void;
  invalidate: () => void;
  targets: () => TTargetId[];
};

// one cache per display output or layer, mirroring the remote side's per-target caches
const createSlotCacheRegistry = <TTargetId, TBuffer extends object>({
  capacity = NUM_BUFFER_SLOTS,
  references = createGarbageCollectedReferences(),
}: {
  capacity?: number;
  references?: TBufferReferenceFactory;
} = {}): TSlotCacheRegistry<TTargetId, TBuffer> => {

  assertCapacityIsValid({ capacity });

  let caches = new Map<TTargetId, TSlotCache<TBuffer>>();

  const cacheFor: TSlotCacheRegistry<TTargetId, TBuffer>["cacheFor"] = ({ targetId }) => {
    const existingCache = caches.get(targetId);
    if (existingCache !== undefined) {
      return existingCache;
    }

    const cache = createSlotCache<TBuffer>({ capacity, references });
    caches.set(targetId, cache);

    return cache;
  };

  const resolve: TSlotCacheRegistry<TTargetId, TBuffer>["resolve"] = ({ targetId, buffer }) => {
    return cacheFor({ targetId }).resolve({ buffer });
  };

  // handles already given out by cacheFor must not keep reporting hits
  const remove: TSlotCacheRegistry<TTargetId, TBuffer>["remove"] = ({ targetId }) => {
    caches.get(targetId)?.reset();
    caches.delete(targetId);
  };

  // remote session was lost, its caches are gone together with it
  const invalidate: TSlotCacheRegistry<TTargetId, TBuffer>["invalidate"] = () => {
    caches.forEach((cache) => {
      cache.reset();
    });

    caches = new Map<TTargetId, TSlotCache<TBuffer>>();
  };

  const targets: TSlotCacheRegistry<TTargetId, TBuffer>["targets"] = () => {
    return [...caches.keys()];
  };

  return {
    cacheFor,
    resolve,
    remove,
    invalidate,
    targets
  };
};

export {
  createSlotCacheRegistry
};

export type {
  TSlotCacheRegistry
};
