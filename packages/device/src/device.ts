import { AtomicCounter } from "./atomic-counter.js";
import type {
  BufferClass,
  ClientSession,
  DmaBuffer,
  DmaPool,
  GraphicsDevice,
  HighMemory,
  JobQueue,
  MapListEntry,
  MemoryArea,
  MemoryControl,
  MemoryControlStatus,
  NamedObject,
  VmaEntry,
} from "./device-types.js";
import { StateLock, type StateLockOptions } from "./state-lock.js";

// ---------------------------------------------------------------------------
// Init shapes: plain values, counters are created by the factories
// ---------------------------------------------------------------------------

export interface JobQueueInit {
  readonly flags?: number;
  readonly useCount?: number;
  readonly finalization?: number;
  readonly blockCount?: number;
  readonly blockRead?: boolean;
  readonly blockWrite?: boolean;
  readonly readWaiters?: number;
  readonly writeWaiters?: number;
  readonly flushWaiters?: number;
  readonly waitlistCount?: number;
  readonly totalFlushed?: number;
  readonly totalQueued?: number;
  readonly totalLocks?: number;
}

export interface BufferClassInit {
  readonly bufSize: number;
  readonly bufCount: number;
  readonly freeCount?: number;
  readonly segCount: number;
  readonly pageOrder: number;
}

export interface DmaPoolInit {
  /** Keyed by allocation order. */
  readonly classes?: Readonly<Record<number, BufferClassInit>>;
  /** Pool-list index of each allocated buffer. */
  readonly bufferLists?: readonly number[];
}

export interface NamedObjectInit {
  readonly name: number;
  readonly size: number;
  readonly handleCount?: number;
  readonly refCount?: number;
}

export interface ObjectStatsInit {
  readonly objectCount?: number;
  readonly objectMemory?: number;
  readonly pinCount?: number;
  readonly pinMemory?: number;
  readonly gttMemory?: number;
  readonly gttTotal?: number;
}

export interface GraphicsDeviceInit {
  readonly index: number;
  readonly driverName: string;
  readonly busId: string;
  readonly unique?: string;
  readonly lock?: StateLockOptions;
  readonly maps?: readonly MapListEntry[];
  readonly queues?: readonly JobQueueInit[];
  readonly dma?: DmaPoolInit;
  readonly clients?: readonly ClientSession[];
  readonly objects?: readonly NamedObjectInit[];
  readonly objectStats?: ObjectStatsInit;
  readonly fences?: { readonly initialized: boolean; readonly count?: number };
  readonly bufferObjects?: {
    readonly initialized: boolean;
    readonly count?: number;
    readonly lockedPages?: number;
  };
  readonly memoryControl?: MemoryControl | MemoryControlStatus;
  readonly memoryTracker?: {
    readonly ramAvailablePages?: number;
    readonly ramUsedBytes?: number;
    readonly areas?: readonly MemoryArea[];
  };
  readonly vmas?: readonly VmaEntry[];
  readonly highMemory?: HighMemory;
}

const EMPTY_MEMORY_STATUS: MemoryControlStatus = {
  usedMemory: 0,
  usedEmergency: 0,
  lowThreshold: 0,
  highThreshold: 0,
  emergencyThreshold: 0,
};

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function createJobQueue(init: JobQueueInit = {}): JobQueue {
  return {
    flags: init.flags ?? 0,
    useCount: new AtomicCounter(init.useCount ?? 0),
    finalization: new AtomicCounter(init.finalization ?? 0),
    blockCount: new AtomicCounter(init.blockCount ?? 0),
    blockRead: new AtomicCounter(init.blockRead ? 1 : 0),
    blockWrite: new AtomicCounter(init.blockWrite ? 1 : 0),
    readQueue: { waiters: init.readWaiters ?? 0 },
    writeQueue: { waiters: init.writeWaiters ?? 0 },
    flushQueue: { waiters: init.flushWaiters ?? 0 },
    waitlistCount: init.waitlistCount ?? 0,
    totalFlushed: new AtomicCounter(init.totalFlushed ?? 0),
    totalQueued: new AtomicCounter(init.totalQueued ?? 0),
    totalLocks: new AtomicCounter(init.totalLocks ?? 0),
  };
}

export function createBufferClass(init: BufferClassInit): BufferClass {
  return {
    bufSize: init.bufSize,
    bufCount: init.bufCount,
    freeCount: new AtomicCounter(init.freeCount ?? 0),
    segCount: init.segCount,
    pageOrder: init.pageOrder,
  };
}

export function createDmaPool(init: DmaPoolInit = {}): DmaPool {
  const classes: (BufferClass | undefined)[] = [];
  for (const [order, entry] of Object.entries(init.classes ?? {})) {
    classes[Number(order)] = createBufferClass(entry);
  }
  const buffers: DmaBuffer[] = (init.bufferLists ?? []).map((list) => ({ list }));
  return { classes, buffers };
}

export function createNamedObject(init: NamedObjectInit): NamedObject {
  return {
    name: init.name,
    size: init.size,
    handleCount: new AtomicCounter(init.handleCount ?? 0),
    refCount: new AtomicCounter(init.refCount ?? 1),
  };
}

/**
 * Memory controller that always reports the same figures.
 */
export function createStaticMemoryControl(status: MemoryControlStatus): MemoryControl {
  return { query: () => status };
}

function isMemoryControl(value: MemoryControl | MemoryControlStatus): value is MemoryControl {
  return "query" in value;
}

/**
 * Builds a device with empty collections unless `init` provides them.
 */
export function createGraphicsDevice(init: GraphicsDeviceInit): GraphicsDevice {
  const objectNames = new Map<number, NamedObject>();
  for (const object of init.objects ?? []) {
    objectNames.set(object.name, createNamedObject(object));
  }

  const stats = init.objectStats ?? {};
  const memoryControl = init.memoryControl ?? EMPTY_MEMORY_STATUS;
  const vmas = [...(init.vmas ?? [])];

  return {
    index: init.index,
    driverName: init.driverName,
    busId: init.busId,
    unique: init.unique,
    structLock: new StateLock(init.lock),
    maps: [...(init.maps ?? [])],
    queues: (init.queues ?? []).map(createJobQueue),
    dma: init.dma ? createDmaPool(init.dma) : undefined,
    clients: [...(init.clients ?? [])],
    objectNames,
    objectStats: {
      objectCount: new AtomicCounter(stats.objectCount ?? 0),
      objectMemory: new AtomicCounter(stats.objectMemory ?? 0),
      pinCount: new AtomicCounter(stats.pinCount ?? 0),
      pinMemory: new AtomicCounter(stats.pinMemory ?? 0),
      gttMemory: new AtomicCounter(stats.gttMemory ?? 0),
      gttTotal: stats.gttTotal ?? 0,
    },
    fenceManager: {
      initialized: init.fences?.initialized ?? false,
      count: new AtomicCounter(init.fences?.count ?? 0),
    },
    bufferManager: {
      initialized: init.bufferObjects?.initialized ?? false,
      count: new AtomicCounter(init.bufferObjects?.count ?? 0),
      curPages: init.bufferObjects?.lockedPages ?? 0,
    },
    memoryControl: isMemoryControl(memoryControl)
      ? memoryControl
      : createStaticMemoryControl(memoryControl),
    memoryTracker: {
      ramAvailablePages: init.memoryTracker?.ramAvailablePages ?? 0,
      ramUsedBytes: init.memoryTracker?.ramUsedBytes ?? 0,
      areas: (init.memoryTracker?.areas ?? []).map((area) => ({ ...area })),
    },
    vmas,
    vmaCount: new AtomicCounter(vmas.length),
    highMemory: init.highMemory ?? { virtual: 0, physical: 0 },
  };
}
