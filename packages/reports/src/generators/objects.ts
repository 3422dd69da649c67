import { LARGE_MEMORY_PAGES } from "../constants.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Object and memory accounting
// ---------------------------------------------------------------------------

function describeUsage(label: string, bytes: number, pageSize: number): string {
  if (bytes > LARGE_MEMORY_PAGES * pageSize) {
    return `${label} is ${Math.floor(bytes / pageSize)} pages.\n`;
  }
  return `${label} is ${bytes} bytes.\n`;
}

export class ObjectsReport implements ReportDescriptor {
  readonly name = "objects";
  readonly requiresLock = true;

  generate({ device, config }: ReportContext, out: ReportBuffer): void {
    const { fenceManager, bufferManager } = device;
    const pageSize = config.pageSize;
    const status = device.memoryControl.query();

    out.print("Object accounting:\n\n");
    if (fenceManager.initialized) {
      out.print(`Number of active fence objects: ${fenceManager.count.value}.\n`);
    } else {
      out.print("Fence objects are not supported by this driver\n");
    }
    if (bufferManager.initialized) {
      out.print(`Number of active buffer objects: ${bufferManager.count.value}.\n`);
    }
    out.print("\n");

    out.print("Memory accounting:\n\n");
    if (bufferManager.initialized) {
      out.print(`Number of locked GATT pages: ${bufferManager.curPages}.\n`);
    } else {
      out.print("Buffer objects are not supported by this driver.\n");
    }
    out.print(describeUsage("Used object memory", status.usedMemory, pageSize));
    out.print(describeUsage("Used emergency memory", status.usedEmergency, pageSize));
    out.print("\n");

    out.print(
      `Soft object memory usage threshold is ${Math.floor(status.lowThreshold / pageSize)} pages.\n`,
    );
    out.print(
      `Hard object memory usage threshold is ${Math.floor(status.highThreshold / pageSize)} pages.\n`,
    );
    out.print(
      `Emergency root only memory usage threshold is ${Math.floor(status.emergencyThreshold / pageSize)} pages.\n`,
    );
    out.print("\n");
  }
}
