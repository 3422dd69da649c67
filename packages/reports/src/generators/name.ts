import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Device identity
// ---------------------------------------------------------------------------

/**
 * Driver name, bus id and, once assigned, the unique string.
 */
export class NameReport implements ReportDescriptor {
  readonly name = "name";
  readonly requiresLock = false;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    if (device.unique) {
      out.print(`${device.driverName} ${device.busId} ${device.unique}\n`);
    } else {
      out.print(`${device.driverName} ${device.busId}\n`);
    }
  }
}
