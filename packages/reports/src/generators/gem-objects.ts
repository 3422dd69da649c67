import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Named-object summary
// ---------------------------------------------------------------------------

export class GemObjectsReport implements ReportDescriptor {
  readonly name = "gem_objects";
  readonly requiresLock = false;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    const stats = device.objectStats;
    out.print(`${stats.objectCount.value} objects\n`);
    out.print(`${stats.objectMemory.value} object bytes\n`);
    out.print(`${stats.pinCount.value} pinned\n`);
    out.print(`${stats.pinMemory.value} pin bytes\n`);
    out.print(`${stats.gttMemory.value} gtt bytes\n`);
    out.print(`${stats.gttTotal} gtt total\n`);
  }
}
