import type { AtomicCounter } from "./atomic-counter.js";
import type { StateLock } from "./state-lock.js";

// ---------------------------------------------------------------------------
// Memory mappings
// ---------------------------------------------------------------------------

export interface DeviceMap {
  offset: number;
  size: number;
  /** One of `MAP_TYPE`; other values are possible and render as unknown. */
  type: number;
  flags: number;
  /** MTRR register index, negative when none is assigned. */
  mtrr: number;
}

export interface MapListEntry {
  /** Absent while the mapping is being torn down. */
  map: DeviceMap | undefined;
  userToken: number;
}

// ---------------------------------------------------------------------------
// Job queues
// ---------------------------------------------------------------------------

export interface WaitQueue {
  waiters: number;
}

export interface JobQueue {
  flags: number;
  /** Transient references; readers hold one while inspecting the queue. */
  readonly useCount: AtomicCounter;
  readonly finalization: AtomicCounter;
  readonly blockCount: AtomicCounter;
  readonly blockRead: AtomicCounter;
  readonly blockWrite: AtomicCounter;
  readonly readQueue: WaitQueue;
  readonly writeQueue: WaitQueue;
  readonly flushQueue: WaitQueue;
  /** Buffers waiting to be dispatched. */
  waitlistCount: number;
  readonly totalFlushed: AtomicCounter;
  readonly totalQueued: AtomicCounter;
  readonly totalLocks: AtomicCounter;
}

// ---------------------------------------------------------------------------
// DMA buffer pool
// ---------------------------------------------------------------------------

/** One allocation class: every buffer in it has the same size. */
export interface BufferClass {
  bufSize: number;
  bufCount: number;
  readonly freeCount: AtomicCounter;
  segCount: number;
  /** Each segment spans 2^pageOrder pages. */
  pageOrder: number;
}

export interface DmaBuffer {
  /** Index of the pool list the buffer currently sits on. */
  list: number;
}

export interface DmaPool {
  /** Indexed by allocation order; missing orders are treated as empty. */
  readonly classes: (BufferClass | undefined)[];
  readonly buffers: DmaBuffer[];
}

// ---------------------------------------------------------------------------
// Clients
// ---------------------------------------------------------------------------

export interface ClientSession {
  authenticated: boolean;
  minorIndex: number;
  pid: number;
  uid: number;
  magic: number;
  ioctlCount: number;
}

// ---------------------------------------------------------------------------
// Shared (named) objects
// ---------------------------------------------------------------------------

export interface NamedObject {
  readonly name: number;
  readonly size: number;
  readonly handleCount: AtomicCounter;
  readonly refCount: AtomicCounter;
}

export interface ObjectStats {
  readonly objectCount: AtomicCounter;
  readonly objectMemory: AtomicCounter;
  readonly pinCount: AtomicCounter;
  readonly pinMemory: AtomicCounter;
  readonly gttMemory: AtomicCounter;
  gttTotal: number;
}

// ---------------------------------------------------------------------------
// Object and memory accounting
// ---------------------------------------------------------------------------

export interface FenceManager {
  initialized: boolean;
  readonly count: AtomicCounter;
}

export interface BufferManager {
  initialized: boolean;
  readonly count: AtomicCounter;
  /** Locked GATT pages. */
  curPages: number;
}

/** Byte figures reported by the memory controller. */
export interface MemoryControlStatus {
  readonly usedMemory: number;
  readonly usedEmergency: number;
  readonly lowThreshold: number;
  readonly highThreshold: number;
  readonly emergencyThreshold: number;
}

export interface MemoryControl {
  query(): MemoryControlStatus;
}

/** One allocation area tracked by the memory tracker. */
export interface MemoryArea {
  readonly name: string;
  succeedCount: number;
  freeCount: number;
  failCount: number;
  bytesAllocated: number;
  bytesFreed: number;
}

export interface MemoryTracker {
  ramAvailablePages: number;
  ramUsedBytes: number;
  readonly areas: MemoryArea[];
}

// ---------------------------------------------------------------------------
// Virtual memory areas (debug builds)
// ---------------------------------------------------------------------------

export interface VirtualMemoryArea {
  start: number;
  end: number;
  /** `VM_FLAG` bits. */
  flags: number;
  pageOffset: number;
  /** Raw page-protection bits (`PAGE_PROT` on x86). */
  pageProtection: number;
}

export interface VmaEntry {
  pid: number;
  vma: VirtualMemoryArea | undefined;
}

export interface HighMemory {
  readonly virtual: number;
  readonly physical: number;
}

// ---------------------------------------------------------------------------
// Device
// ---------------------------------------------------------------------------

/**
 * Live, mutable state of one graphics device instance.
 *
 * Diagnostics borrow this handle for the duration of one locked
 * generation; every collection may change between generations.
 */
export interface GraphicsDevice {
  /** Minor index; names the device's diagnostics directory. */
  readonly index: number;
  readonly driverName: string;
  readonly busId: string;
  unique: string | undefined;
  readonly structLock: StateLock;
  readonly maps: MapListEntry[];
  readonly queues: JobQueue[];
  dma: DmaPool | undefined;
  readonly clients: ClientSession[];
  readonly objectNames: Map<number, NamedObject>;
  readonly objectStats: ObjectStats;
  readonly fenceManager: FenceManager;
  readonly bufferManager: BufferManager;
  readonly memoryControl: MemoryControl;
  readonly memoryTracker: MemoryTracker;
  readonly vmas: VmaEntry[];
  readonly vmaCount: AtomicCounter;
  readonly highMemory: HighMemory;
}
