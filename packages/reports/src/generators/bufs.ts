import { dec } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// DMA buffer pool
// ---------------------------------------------------------------------------

/**
 * Per-order allocation classes followed by the list index of every
 * buffer. Devices without a DMA pool produce an empty report.
 */
export class BufsReport implements ReportDescriptor {
  readonly name = "bufs";
  readonly requiresLock = true;

  generate({ device, config }: ReportContext, out: ReportBuffer): void {
    const dma = device.dma;
    if (!dma) return;

    out.print(" o     size count  free  segs pages    kB\n\n");
    for (let order = 0; order <= config.maxOrder; order++) {
      const entry = dma.classes[order];
      if (!entry || entry.bufCount === 0) continue;

      const pages = entry.segCount * 2 ** entry.pageOrder;
      const kilobytes = Math.floor((pages * config.pageSize) / 1024);
      out.print(
        `${dec(order, 2)} ${dec(entry.bufSize, 8)} ${dec(entry.bufCount, 5)} ` +
          `${dec(entry.freeCount.value, 5)} ${dec(entry.segCount, 5)} ` +
          `${dec(pages, 5)} ${dec(kilobytes, 5)}\n`,
      );
    }

    out.print("\n");
    dma.buffers.forEach((buffer, index) => {
      if (index !== 0 && index % config.bufferListWrap === 0) {
        out.print("\n");
      }
      out.print(` ${dec(buffer.list)}`);
    });
    out.print("\n");
  }
}
