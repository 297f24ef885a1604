import type { TBufferReference, TBufferReferenceFactory } from "./buffer-reference.ts";
import { createGarbageCollectedReferences } from "./garbage-collected-references.ts";
import { createRecencyCounter } from "./recency-counter.ts";
import { NUM_BUFFER_SLOTS } from "./constants.ts";

type TSlotEntry<TBuffer extends object> = {
  reference: TBufferReference<TBuffer> | undefined;
  lastUsed: bigint;
};

type TSlotResolution<TBuffer extends object> = {
  slot: number;
  transmitBuffer: TBuffer | undefined;
};

type TSlotState = "never-used" | "live" | "stale";

type TSlotInfo = {
  slot: number;
  lastUsed: bigint;
  state: TSlotState;
};

type TSlotCacheInfo = {
  capacity: number;
  counter: bigint;
  slots: TSlotInfo[];
};

type TSlotCache<TBuffer extends object> = {
  capacity: number;
  resolve: (args: { buffer: TBuffer }) => TSlotResolution<TBuffer>;
  reset: () => void;
  info: () => TSlotCacheInfo;
};

const assertCapacityIsValid = ({ capacity }: { capacity: number }): void => {
  if (!Number.isSafeInteger(capacity) || capacity <= 0) {
    throw Error(`invalid slot cache capacity ${capacity}, must be a positive integer`);
  }
};

const createEmptySlots = <TBuffer extends object>({ capacity }: { capacity: number }): TSlotEntry<TBuffer>[] => {
  return Array.from({ length: capacity }, () => {
    return {
      reference: undefined,
      lastUsed: 0n
    };
  });
};

/**
 * Mirror of a remote composer's per-target buffer cache.
 *
 * `resolve` tells the caller which slot to announce a buffer under and
 * whether the buffer itself has to be transmitted. A buffer the remote side
 * already holds comes back with `transmitBuffer` set to undefined; the
 * caller only sends the slot index then.
 *
 * Slots hold non-owning references. A buffer destroyed by its owner leaves
 * a stale slot behind, which never matches again but keeps its age for
 * least-recently-used eviction.
 *
 * The local and remote cache must agree on `capacity` and must be reset
 * together whenever the remote side drops its cache.
 */
const createSlotCache = <TBuffer extends object>({
  capacity = NUM_BUFFER_SLOTS,
  references = createGarbageCollectedReferences(),
}: {
  capacity?: number;
  references?: TBufferReferenceFactory;
} = {}): TSlotCache<TBuffer> => {

  assertCapacityIsValid({ capacity });

  const counter = createRecencyCounter();
  let slots = createEmptySlots<TBuffer>({ capacity });

  const findCachedSlot = ({ buffer }: { buffer: TBuffer }): number => {
    return slots.findIndex(({ reference }) => {
      return reference !== undefined && reference.deref() === buffer;
    });
  };

  // first minimum wins, so equal ages evict the lowest index
  const findLeastRecentlyUsedSlot = (): number => {
    let leastRecentlyUsed = 0;

    slots.forEach(({ lastUsed }, slot) => {
      if (lastUsed < slots[leastRecentlyUsed].lastUsed) {
        leastRecentlyUsed = slot;
      }
    });

    return leastRecentlyUsed;
  };

  const resolve: TSlotCache<TBuffer>["resolve"] = ({ buffer }) => {
    const cachedSlot = findCachedSlot({ buffer });

    if (cachedSlot >= 0) {
      slots[cachedSlot].lastUsed = counter.next();

      return {
        slot: cachedSlot,
        transmitBuffer: undefined
      };
    }

    const reference = references.createReference({ buffer });
    const slot = findLeastRecentlyUsedSlot();

    slots[slot] = {
      reference,
      lastUsed: counter.next()
    };

    return {
      slot,
      transmitBuffer: buffer
    };
  };

  const reset: TSlotCache<TBuffer>["reset"] = () => {
    slots = createEmptySlots<TBuffer>({ capacity });
  };

  const slotState = ({ reference }: TSlotEntry<TBuffer>): TSlotState => {
    if (reference === undefined) {
      return "never-used";
    }

    return reference.deref() === undefined ? "stale" : "live";
  };

  const info: TSlotCache<TBuffer>["info"] = () => {
    return {
      capacity,
      counter: counter.peek(),
      slots: slots.map((entry, slot) => {
        return {
          slot,
          lastUsed: entry.lastUsed,
          state: slotState(entry)
        };
      })
    };
  };

  return {
    capacity,
    resolve,
    reset,
    info
  };
};

export {
  assertCapacityIsValid,
  createSlotCache
};

export type {
  TSlotCache,
  TSlotCacheInfo,
  TSlotInfo,
  TSlotResolution,
  TSlotState
};
