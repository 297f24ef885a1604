import { createReleaseTrackingReferences, createSlotCacheRegistry } from "../lib/index.ts";

type TLayerBuffer = {
  name: string;
};

const references = createReleaseTrackingReferences();

const registry = createSlotCacheRegistry<string, TLayerBuffer>({
  capacity: 3,
  references
});

const wallpaper: TLayerBuffer = { name: "wallpaper" };
const swapchain = ["frame-a", "frame-b", "frame-c"].map((name): TLayerBuffer => {
  return { name };
});

const announce = ({ layer, buffer }: { layer: string, buffer: TLayerBuffer }) => {
  const { slot, transmitBuffer } = registry.resolve({ targetId: layer, buffer });

  console.log({
    layer,
    buffer: buffer.name,
    slot,
    transmit: transmitBuffer === undefined ? "cached" : transmitBuffer.name
  });
};

for (let frame = 0; frame < 5; frame += 1) {
  announce({ layer: "background", buffer: wallpaper });
  announce({ layer: "app", buffer: swapchain[frame % swapchain.length] });
}

// the app reallocated its swapchain, old buffers are closed by their owner
swapchain.forEach((buffer) => {
  references.release({ buffer });
});

const resized: TLayerBuffer = { name: "frame-resized" };
announce({ layer: "app", buffer: resized });

console.log(registry.cacheFor({ targetId: "app" }).info());

// remote composer restarted
registry.invalidate();
announce({ layer: "background", buffer: wallpaper });
