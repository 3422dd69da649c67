import {
  createGraphicsDevice,
  type GraphicsDevice,
  type GraphicsDeviceInit,
  MAP_TYPE,
  PAGE_PROT,
  VM_FLAG,
} from "@devinfo/device";

/**
 * Device with no state beyond its identity.
 */
export function createTestDevice(overrides: Partial<GraphicsDeviceInit> = {}): GraphicsDevice {
  return createGraphicsDevice({
    index: 0,
    driverName: "gfx",
    busId: "pci:0000:01:00.0",
    ...overrides,
  });
}

/**
 * Device with at least one entry in every collection the reports read.
 */
export function createPopulatedDevice(overrides: Partial<GraphicsDeviceInit> = {}): GraphicsDevice {
  return createTestDevice({
    unique: "pci:0000:01:00.0",
    maps: [
      {
        map: { offset: 0xe0000000, size: 0x1000000, type: MAP_TYPE.FRAME_BUFFER, flags: 0, mtrr: 1 },
        userToken: 0x10000000,
      },
      { map: undefined, userToken: 0 },
      {
        map: { offset: 0xfd000000, size: 0x80000, type: MAP_TYPE.REGISTERS, flags: 0x22, mtrr: -1 },
        userToken: 0x10001000,
      },
    ],
    queues: [
      { flags: 0x1, totalQueued: 12, totalFlushed: 10, totalLocks: 3, readWaiters: 1 },
      { blockRead: true, blockWrite: true, finalization: 1, waitlistCount: 2 },
    ],
    dma: {
      classes: {
        0: { bufSize: 4096, bufCount: 8, freeCount: 6, segCount: 8, pageOrder: 0 },
        4: { bufSize: 65536, bufCount: 2, freeCount: 2, segCount: 2, pageOrder: 4 },
      },
      bufferLists: [0, 1, 0, 2],
    },
    clients: [
      { authenticated: true, minorIndex: 0, pid: 1200, uid: 1000, magic: 7, ioctlCount: 42 },
      { authenticated: false, minorIndex: 64, pid: 1300, uid: 0, magic: 0, ioctlCount: 3 },
    ],
    objects: [
      { name: 1, size: 4096, handleCount: 1, refCount: 2 },
      { name: 2, size: 1048576, handleCount: 2, refCount: 3 },
    ],
    objectStats: {
      objectCount: 2,
      objectMemory: 1052672,
      pinCount: 1,
      pinMemory: 4096,
      gttMemory: 8192,
      gttTotal: 268435456,
    },
    fences: { initialized: true, count: 4 },
    bufferObjects: { initialized: true, count: 9, lockedPages: 16 },
    memoryControl: {
      usedMemory: 20 * 4096,
      usedEmergency: 5,
      lowThreshold: 256 * 4096,
      highThreshold: 512 * 4096,
      emergencyThreshold: 640 * 4096,
    },
    memoryTracker: {
      ramAvailablePages: 1024,
      ramUsedBytes: 8192,
      areas: [
        {
          name: "driver",
          succeedCount: 10,
          freeCount: 4,
          failCount: 0,
          bytesAllocated: 2048,
          bytesFreed: 512,
        },
      ],
    },
    vmas: [
      {
        pid: 1200,
        vma: {
          start: 0x7f000000,
          end: 0x7f001000,
          flags: VM_FLAG.READ | VM_FLAG.WRITE | VM_FLAG.MAYSHARE,
          pageOffset: 0xe0000,
          pageProtection: PAGE_PROT.PRESENT | PAGE_PROT.RW | PAGE_PROT.USER,
        },
      },
    ],
    highMemory: { virtual: 0x38000000, physical: 0x38000000 },
    ...overrides,
  });
}

const decoder = new TextDecoder();

export function decodeReport(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
