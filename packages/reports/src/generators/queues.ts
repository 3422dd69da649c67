import type { JobQueue } from "@devinfo/device";
import { dec, flag, hex } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Job-queue table
// ---------------------------------------------------------------------------

function formatQueue(index: number, queue: JobQueue): string {
  const blocked =
    flag(queue.blockRead.value !== 0, "r") + flag(queue.blockWrite.value !== 0, "w");
  const waiting =
    flag(queue.readQueue.waiters > 0, "r") +
    flag(queue.writeQueue.waiters > 0, "w") +
    flag(queue.flushQueue.waiters > 0, "f");

  return (
    `${dec(index, 5)}/0x${hex(queue.flags, 3)} ${dec(queue.useCount.value, 5)} ` +
    `${dec(queue.finalization.value, 5)} ${dec(queue.blockCount.value, 5)}/${blocked}/${waiting} ` +
    `${dec(queue.waitlistCount, 5)} ${dec(queue.totalFlushed.value, 10)} ` +
    `${dec(queue.totalQueued.value, 10)} ${dec(queue.totalLocks.value, 10)}\n`
  );
}

/**
 * One row per job queue. Each queue is pinned with a use-count reference
 * while its row is formatted, so the printed use count includes it.
 */
export class QueuesReport implements ReportDescriptor {
  readonly name = "queues";
  readonly requiresLock = true;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    out.print("  ctx/flags   use   fin   blk/rw/rwf  wait    flushed     queued      locks\n\n");

    device.queues.forEach((queue, index) => {
      queue.useCount.increment();
      try {
        out.print(formatQueue(index, queue));
      } finally {
        queue.useCount.decrement();
      }
    });
  }
}
