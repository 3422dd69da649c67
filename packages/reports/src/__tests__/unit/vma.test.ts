import { PAGE_PROT } from "@devinfo/device";
import { createPopulatedDevice, createTestDevice } from "@devinfo/test-utils";
import { describe, expect, it } from "vitest";
import { isX86, pageProtectionFlags, VmaReport } from "../../generators/vma.js";
import { render } from "../render.js";

const HEADER = "vma use count: 1, high_memory = 0x0000000038000000, 0x38000000\n";

describe("VmaReport", () => {
  it("appends page-protection characters on x86", () => {
    expect(render(new VmaReport(), createPopulatedDevice(), { architecture: "x64" })).toBe(
      `${HEADER}\n 1200 0x7f000000-0x7f001000 rw-s-- 0x000e0000000 pwubc--kl\n`,
    );
  });

  it("omits them elsewhere", () => {
    expect(render(new VmaReport(), createPopulatedDevice(), { architecture: "arm64" })).toBe(
      `${HEADER}\n 1200 0x7f000000-0x7f001000 rw-s-- 0x000e0000000\n`,
    );
  });

  it("skips entries without an area", () => {
    const device = createTestDevice({ vmas: [{ pid: 1, vma: undefined }] });
    expect(render(new VmaReport(), device)).toBe(
      "vma use count: 1, high_memory = 0x0000000000000000, 0x00000000\n",
    );
  });
});

describe("pageProtectionFlags", () => {
  it("renders clear bits with their alternate characters", () => {
    expect(pageProtectionFlags(0)).toBe("-rsbc--kl");
  });

  it("renders every set bit", () => {
    let all = 0;
    for (const bit of Object.values(PAGE_PROT)) {
      all |= bit;
    }
    expect(pageProtectionFlags(all)).toBe("pwutuadmg");
  });
});

describe("isX86", () => {
  it("recognizes both x86 widths", () => {
    expect(isX86("ia32")).toBe(true);
    expect(isX86("x64")).toBe(true);
    expect(isX86("arm64")).toBe(false);
  });
});
