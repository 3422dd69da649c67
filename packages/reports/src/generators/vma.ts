import { PAGE_PROT, VM_FLAG, type VirtualMemoryArea } from "@devinfo/device";
import { X86_ARCHITECTURES } from "../constants.js";
import { dec, flag, hex } from "../format.js";
import type { ReportBuffer } from "../report-buffer.js";
import type { ReportContext, ReportDescriptor } from "../types.js";

// ---------------------------------------------------------------------------
// Virtual memory areas (debug only)
// ---------------------------------------------------------------------------

function vmaFlags(vma: VirtualMemoryArea): string {
  const has = (bit: number): boolean => (vma.flags & bit) !== 0;
  return (
    flag(has(VM_FLAG.READ), "r") +
    flag(has(VM_FLAG.WRITE), "w") +
    flag(has(VM_FLAG.EXEC), "x") +
    flag(has(VM_FLAG.MAYSHARE), "s", "p") +
    flag(has(VM_FLAG.LOCKED), "l") +
    flag(has(VM_FLAG.IO), "i")
  );
}

export function pageProtectionFlags(protection: number): string {
  const has = (bit: number): boolean => (protection & bit) !== 0;
  return (
    flag(has(PAGE_PROT.PRESENT), "p") +
    flag(has(PAGE_PROT.RW), "w", "r") +
    flag(has(PAGE_PROT.USER), "u", "s") +
    flag(has(PAGE_PROT.PWT), "t", "b") +
    flag(has(PAGE_PROT.PCD), "u", "c") +
    flag(has(PAGE_PROT.ACCESSED), "a") +
    flag(has(PAGE_PROT.DIRTY), "d") +
    flag(has(PAGE_PROT.PSE), "m", "k") +
    flag(has(PAGE_PROT.GLOBAL), "g", "l")
  );
}

export function isX86(architecture: string): boolean {
  return X86_ARCHITECTURES.includes(architecture);
}

/**
 * Mapped virtual memory areas with their access flags. On x86 the raw
 * page-protection bits follow as nine extra characters.
 */
export class VmaReport implements ReportDescriptor {
  readonly name = "vma";
  readonly requiresLock = true;

  generate({ device, config }: ReportContext, out: ReportBuffer): void {
    const x86 = isX86(config.architecture);

    out.print(
      `vma use count: ${device.vmaCount.value}, high_memory = ` +
        `0x${hex(device.highMemory.virtual, 16)}, 0x${hex(device.highMemory.physical, 8)}\n`,
    );

    for (const entry of device.vmas) {
      const vma = entry.vma;
      if (!vma) continue;

      out.print(
        `\n${dec(entry.pid, 5)} 0x${hex(vma.start, 8)}-0x${hex(vma.end, 8)} ` +
          `${vmaFlags(vma)} 0x${hex(vma.pageOffset, 8)}000`,
      );
      if (x86) {
        out.print(` ${pageProtectionFlags(vma.pageProtection)}`);
      }
      out.print("\n");
    }
  }
}
