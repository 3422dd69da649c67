/**
 * JSON device snapshots: a serialisable description of a device's state,
 * used by the CLI and fixtures to stand up a {@link GraphicsDevice}.
 */

import { DeviceSnapshotInvalidError, type ValidationIssue } from "@devinfo/errors";
import { z } from "zod";
import { ATOMIC_COUNTER_MAX } from "./atomic-counter.js";
import { createGraphicsDevice } from "./device.js";
import type { GraphicsDevice } from "./device-types.js";

const count = z.number().int().nonnegative();
// Fields held in an AtomicCounter are 32-bit signed.
const atomic = count.max(ATOMIC_COUNTER_MAX, {
  message: `must fit a 32-bit counter (at most ${ATOMIC_COUNTER_MAX})`,
});

const mapEntrySchema = z
  .object({
    map: z
      .object({
        offset: count,
        size: count,
        type: z.number().int(),
        flags: count,
        mtrr: z.number().int().default(-1),
      })
      .optional(),
    userToken: count.default(0),
  })
  .transform((entry) => ({ map: entry.map, userToken: entry.userToken }));

const queueSchema = z.object({
  flags: count.optional(),
  useCount: atomic.optional(),
  finalization: atomic.optional(),
  blockCount: atomic.optional(),
  blockRead: z.boolean().optional(),
  blockWrite: z.boolean().optional(),
  readWaiters: count.optional(),
  writeWaiters: count.optional(),
  flushWaiters: count.optional(),
  waitlistCount: count.optional(),
  totalFlushed: atomic.optional(),
  totalQueued: atomic.optional(),
  totalLocks: atomic.optional(),
});

const bufferClassSchema = z.object({
  bufSize: count,
  bufCount: count,
  freeCount: atomic.optional(),
  segCount: count,
  pageOrder: z.number().int().min(0).max(31),
});

const dmaSchema = z.object({
  classes: z
    .record(z.string().regex(/^\d+$/, { message: "order keys must be integers" }), bufferClassSchema)
    .optional(),
  bufferLists: z.array(z.number().int()).optional(),
});

const clientSchema = z.object({
  authenticated: z.boolean(),
  minorIndex: count,
  pid: count,
  uid: count,
  magic: count,
  ioctlCount: count,
});

const namedObjectSchema = z.object({
  name: count,
  size: count,
  handleCount: atomic.optional(),
  refCount: atomic.optional(),
});

const memoryAreaSchema = z.object({
  name: z.string().min(1),
  succeedCount: count,
  freeCount: count,
  failCount: count,
  bytesAllocated: count,
  bytesFreed: count,
});

const vmaSchema = z
  .object({
    pid: count,
    vma: z
      .object({
        start: count,
        end: count,
        flags: count,
        pageOffset: count,
        pageProtection: count.default(0),
      })
      .optional(),
  })
  .transform((entry) => ({ pid: entry.pid, vma: entry.vma }));

export const DeviceSnapshotSchema = z.object({
  index: count,
  driverName: z.string().min(1),
  busId: z.string().min(1),
  unique: z.string().optional(),
  maps: z.array(mapEntrySchema).optional(),
  queues: z.array(queueSchema).optional(),
  dma: dmaSchema.optional(),
  clients: z.array(clientSchema).optional(),
  objects: z.array(namedObjectSchema).optional(),
  objectStats: z
    .object({
      objectCount: atomic.optional(),
      objectMemory: atomic.optional(),
      pinCount: atomic.optional(),
      pinMemory: atomic.optional(),
      gttMemory: atomic.optional(),
      gttTotal: count.optional(),
    })
    .optional(),
  fences: z.object({ initialized: z.boolean(), count: atomic.optional() }).optional(),
  bufferObjects: z
    .object({
      initialized: z.boolean(),
      count: atomic.optional(),
      lockedPages: count.optional(),
    })
    .optional(),
  memoryControl: z
    .object({
      usedMemory: count,
      usedEmergency: count,
      lowThreshold: count,
      highThreshold: count,
      emergencyThreshold: count,
    })
    .optional(),
  memoryTracker: z
    .object({
      ramAvailablePages: count.optional(),
      ramUsedBytes: count.optional(),
      areas: z.array(memoryAreaSchema).optional(),
    })
    .optional(),
  vmas: z.array(vmaSchema).optional(),
  highMemory: z.object({ virtual: count, physical: count }).optional(),
});

export type DeviceSnapshot = z.input<typeof DeviceSnapshotSchema>;

/**
 * Validates a parsed snapshot document and builds the device it describes.
 *
 * @throws {DeviceSnapshotInvalidError} when the document does not match the schema
 */
export function loadDeviceSnapshot(raw: unknown, source = "<inline>"): GraphicsDevice {
  const result = DeviceSnapshotSchema.safeParse(raw);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join(".") || "(root)",
      message: issue.message,
      code: issue.code,
    }));
    throw new DeviceSnapshotInvalidError(source, issues);
  }

  return createGraphicsDevice(result.data);
}
