import { dec } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Named-object listing
// ---------------------------------------------------------------------------

/**
 * Lists every named object. Once the buffer has passed the size limit the
 * walk still visits the remaining objects but writes nothing for them.
 */
export class GemNamesReport implements ReportDescriptor {
  readonly name = "gem_names";
  readonly requiresLock = true;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    out.print("  name     size handles refcount\n");
    for (const object of device.objectNames.values()) {
      if (out.overflowed) continue;
      out.print(
        `${dec(object.name, 6)}${dec(object.size, 9)}` +
          `${dec(object.handleCount.value, 8)}${dec(object.refCount.value, 9)}\n`,
      );
    }
  }
}
