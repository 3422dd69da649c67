import { dec, left } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Memory tracker table
// ---------------------------------------------------------------------------

const TITLE_LINE = `${" ".repeat(19)}total counts${" ".repeat(18)}|    outstanding\n`;
const HEADER_LINE = `${left("type", 9)} alloc freed fail      bytes      freed | allocs      bytes\n\n`;

function summaryRow(label: string, kilobytes: number): string {
  return `${left(label, 9)} ${dec(0, 5)} ${dec(0, 5)} ${dec(0, 4)} ${dec(kilobytes, 10)} kB         |\n`;
}

/**
 * Allocation statistics kept by the memory tracker. The tracker owns its
 * own figures, so this report does not take the device lock.
 */
export class MemReport implements ReportDescriptor {
  readonly name = "mem";
  readonly requiresLock = false;

  generate({ device, config }: ReportContext, out: ReportBuffer): void {
    const tracker = device.memoryTracker;

    out.print(TITLE_LINE);
    out.print(HEADER_LINE);
    out.print(
      summaryRow("system", Math.floor((tracker.ramAvailablePages * config.pageSize) / 1024)),
    );
    out.print(summaryRow("locked", Math.floor(tracker.ramUsedBytes / 1024)));
    out.print("\n");

    for (const area of tracker.areas) {
      out.print(
        `${left(area.name, 9)} ${dec(area.succeedCount, 5)} ${dec(area.freeCount, 5)} ` +
          `${dec(area.failCount, 4)} ${dec(area.bytesAllocated, 10)} ${dec(area.bytesFreed, 10)} | ` +
          `${dec(area.succeedCount - area.freeCount, 6)} ${dec(area.bytesAllocated - area.bytesFreed, 10)}\n`,
      );
    }
  }
}
