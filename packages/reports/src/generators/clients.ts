import { dec, flag } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Client sessions
// ---------------------------------------------------------------------------

export class ClientsReport implements ReportDescriptor {
  readonly name = "clients";
  readonly requiresLock = true;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    out.print("a dev   pid   uid      magic     ioctls\n\n");
    for (const client of device.clients) {
      out.print(
        `${flag(client.authenticated, "y", "n")} ${dec(client.minorIndex, 3)} ` +
          `${dec(client.pid, 5)} ${dec(client.uid, 5)} ` +
          `${dec(client.magic, 10)} ${dec(client.ioctlCount, 10)}\n`,
      );
    }
  }
}
