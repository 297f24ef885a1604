import { createSlotCache } from "./slot-cache.ts";
import { createSlotCacheRegistry } from "./slot-cache-registry.ts";
import { createGarbageCollectedReferences } from "./garbage-collected-references.ts";
import { createReleaseTrackingReferences } from "./release-tracking-references.ts";
import { NUM_BUFFER_SLOTS } from "./constants.ts";
import type {
  TSlotCache,
  TSlotCacheInfo,
  TSlotInfo,
  TSlotResolution,
  TSlotState
} from "./slot-cache.ts";
import type { TSlotCacheRegistry } from "./slot-cache-registry.ts";
import type { TBufferReference, TBufferReferenceFactory } from "./buffer-reference.ts";
import type { TReleaseTrackingReferences } from "./release-tracking-references.ts";

export {
  createSlotCache,
  createSlotCacheRegistry,
  createGarbageCollectedReferences,
  createReleaseTrackingReferences,
  NUM_BUFFER_SLOTS
};

export type {
  TSlotCache,
  TSlotCacheInfo,
  TSlotInfo,
  TSlotResolution,
  TSlotState,
  TSlotCacheRegistry,
  TBufferReference,
  TBufferReferenceFactory,
  TReleaseTrackingReferences
};
