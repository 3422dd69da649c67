/**
 * @devinfo/device
 *
 * Live state model of a graphics device instance as seen by diagnostics:
 * mapping list, job queues, DMA buffer pool, clients, named objects and
 * accounting counters, plus the per-device state lock.
 */

export { ATOMIC_COUNTER_MAX, AtomicCounter } from "./atomic-counter.js";
export {
  DEFAULT_PANIC_THRESHOLD,
  DEFAULT_YIELD_AFTER_SPINS,
  StateLock,
  type StateLockOptions,
} from "./state-lock.js";
export {
  type KnownMapType,
  MAP_TYPE,
  MAX_BUFFER_ORDER,
  PACKAGE_NAME,
  PAGE_PROT,
  VM_FLAG,
} from "./constants.js";
export {
  type BufferClassInit,
  createBufferClass,
  createDmaPool,
  createGraphicsDevice,
  createJobQueue,
  createNamedObject,
  createStaticMemoryControl,
  type DmaPoolInit,
  type GraphicsDeviceInit,
  type JobQueueInit,
  type NamedObjectInit,
  type ObjectStatsInit,
} from "./device.js";
export { type DeviceSnapshot, DeviceSnapshotSchema, loadDeviceSnapshot } from "./snapshot.js";
export type {
  BufferClass,
  BufferManager,
  ClientSession,
  DeviceMap,
  DmaBuffer,
  DmaPool,
  FenceManager,
  GraphicsDevice,
  HighMemory,
  JobQueue,
  MapListEntry,
  MemoryArea,
  MemoryControl,
  MemoryControlStatus,
  MemoryTracker,
  NamedObject,
  ObjectStats,
  VirtualMemoryArea,
  VmaEntry,
  WaitQueue,
} from "./device-types.js";
