import { MAP_TYPE } from "@devinfo/device";
import { dec, fixed, hex } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Mapping table
// ---------------------------------------------------------------------------

const TYPE_TAGS: Readonly<Record<number, string>> = {
  [MAP_TYPE.FRAME_BUFFER]: "FB",
  [MAP_TYPE.REGISTERS]: "REG",
  [MAP_TYPE.SHM]: "SHM",
  [MAP_TYPE.AGP]: "AGP",
  [MAP_TYPE.SCATTER_GATHER]: "SG",
  [MAP_TYPE.CONSISTENT]: "PCI",
};

const UNKNOWN_TAG = "??";

export function mapTypeTag(type: number): string {
  return TYPE_TAGS[type] ?? UNKNOWN_TAG;
}

/**
 * One row per registered mapping. Entries whose mapping is gone are
 * skipped without using up a slot number.
 */
export class VmReport implements ReportDescriptor {
  readonly name = "vm";
  readonly requiresLock = true;

  generate({ device }: ReportContext, out: ReportBuffer): void {
    out.print("slot     offset       size type flags    address mtrr\n\n");

    let slot = 0;
    for (const entry of device.maps) {
      const map = entry.map;
      if (!map) continue;

      out.print(
        `${dec(slot, 4)} 0x${hex(map.offset, 8)} 0x${hex(map.size, 8)} ` +
          `${fixed(mapTypeTag(map.type), 4)}  0x${hex(map.flags, 2)} 0x${hex(entry.userToken, 8)} `,
      );
      out.print(map.mtrr < 0 ? "none\n" : `${dec(map.mtrr, 4)}\n`);
      slot++;
    }
  }
}
