/**
 * Constants for @devinfo/device.
 */

export const PACKAGE_NAME = "@devinfo/device";

/** Highest buffer-pool allocation order a DMA pool can hold. */
export const MAX_BUFFER_ORDER = 22;

// ---------------------------------------------------------------------------
// Map types, in the order the mapping table tags them
// ---------------------------------------------------------------------------

export const MAP_TYPE = {
  FRAME_BUFFER: 0,
  REGISTERS: 1,
  SHM: 2,
  AGP: 3,
  SCATTER_GATHER: 4,
  CONSISTENT: 5,
} as const;

export type KnownMapType = (typeof MAP_TYPE)[keyof typeof MAP_TYPE];

// ---------------------------------------------------------------------------
// Virtual memory area flags
// ---------------------------------------------------------------------------

export const VM_FLAG = {
  READ: 0x0001,
  WRITE: 0x0002,
  EXEC: 0x0004,
  MAYSHARE: 0x0080,
  LOCKED: 0x2000,
  IO: 0x4000,
} as const;

// x86 page-table entry bits
export const PAGE_PROT = {
  PRESENT: 0x001,
  RW: 0x002,
  USER: 0x004,
  PWT: 0x008,
  PCD: 0x010,
  ACCESSED: 0x020,
  DIRTY: 0x040,
  PSE: 0x080,
  GLOBAL: 0x100,
} as const;
