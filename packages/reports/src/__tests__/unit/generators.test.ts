import { createPopulatedDevice, createTestDevice } from "@devinfo/test-utils";
import { describe, expect, it } from "vitest";
import { BufsReport } from "../../generators/bufs.js";
import { ClientsReport } from "../../generators/clients.js";
import { GemNamesReport } from "../../generators/gem-names.js";
import { GemObjectsReport } from "../../generators/gem-objects.js";
import { getBuiltinReports } from "../../generators/index.js";
import { MemReport } from "../../generators/mem.js";
import { NameReport } from "../../generators/name.js";
import { ObjectsReport } from "../../generators/objects.js";
import { QueuesReport } from "../../generators/queues.js";
import { mapTypeTag, VmReport } from "../../generators/vm.js";
import { render } from "../render.js";

describe("NameReport", () => {
  it("includes the unique string once assigned", () => {
    const device = createTestDevice({ unique: "pci:0000:01:00.0" });
    expect(render(new NameReport(), device)).toBe("gfx pci:0000:01:00.0 pci:0000:01:00.0\n");
  });

  it("omits an absent or empty unique string", () => {
    expect(render(new NameReport(), createTestDevice())).toBe("gfx pci:0000:01:00.0\n");
    expect(render(new NameReport(), createTestDevice({ unique: "" }))).toBe(
      "gfx pci:0000:01:00.0\n",
    );
  });
});

describe("VmReport", () => {
  it("skips entries without a mapping and keeps slots contiguous", () => {
    expect(render(new VmReport(), createPopulatedDevice())).toBe(
      "slot     offset       size type flags    address mtrr\n\n" +
        "   0 0xe0000000 0x01000000   FB  0x00 0x10000000    1\n" +
        "   1 0xfd000000 0x00080000  REG  0x22 0x10001000 none\n",
    );
  });

  it("renders unknown map types as a placeholder", () => {
    const device = createTestDevice({
      maps: [{ map: { offset: 0, size: 0x1000, type: 9, flags: 0, mtrr: -1 }, userToken: 0 }],
    });
    expect(render(new VmReport(), device)).toBe(
      "slot     offset       size type flags    address mtrr\n\n" +
        "   0 0x00000000 0x00001000   ??  0x00 0x00000000 none\n",
    );
  });

  it("maps every known type code to its tag", () => {
    expect([0, 1, 2, 3, 4, 5, 6, -1].map(mapTypeTag)).toEqual([
      "FB",
      "REG",
      "SHM",
      "AGP",
      "SG",
      "PCI",
      "??",
      "??",
    ]);
  });
});

describe("QueuesReport", () => {
  it("counts the reader's own reference and releases it afterwards", () => {
    const device = createPopulatedDevice();
    expect(render(new QueuesReport(), device)).toBe(
      "  ctx/flags   use   fin   blk/rw/rwf  wait    flushed     queued      locks\n\n" +
        "    0/0x001     1     0     0/--/r--     0         10         12          3\n" +
        "    1/0x000     1     1     0/rw/---     2          0          0          0\n",
    );
    expect(device.queues.map((queue) => queue.useCount.value)).toEqual([0, 0]);
  });

  it("releases the reference when formatting throws", () => {
    const device = createTestDevice({ queues: [{}] });
    const queue = device.queues[0];
    if (!queue) throw new Error("expected a queue");
    Object.defineProperty(queue, "waitlistCount", {
      get: () => {
        throw new Error("queue torn down");
      },
    });

    expect(() => render(new QueuesReport(), device)).toThrow("queue torn down");
    expect(queue.useCount.value).toBe(0);
  });
});

describe("BufsReport", () => {
  it("produces nothing without a DMA pool", () => {
    expect(render(new BufsReport(), createTestDevice())).toBe("");
  });

  it("lists populated orders with page and kB arithmetic", () => {
    expect(render(new BufsReport(), createPopulatedDevice())).toBe(
      " o     size count  free  segs pages    kB\n\n" +
        " 0     4096     8     6     8     8    32\n" +
        " 4    65536     2     2     2    32   128\n" +
        "\n" +
        " 0 1 0 2\n",
    );
  });

  it("derives kB from the configured page size", () => {
    const device = createTestDevice({
      dma: { classes: { 1: { bufSize: 8192, bufCount: 1, segCount: 1, pageOrder: 1 } } },
    });
    expect(render(new BufsReport(), device, { pageSize: 8192 })).toBe(
      " o     size count  free  segs pages    kB\n\n" + " 1     8192     1     0     1     2    16\n" + "\n" + "\n",
    );
  });

  it("ignores orders above maxOrder", () => {
    const device = createTestDevice({
      dma: { classes: { 3: { bufSize: 32768, bufCount: 1, segCount: 1, pageOrder: 3 } } },
    });
    expect(render(new BufsReport(), device, { maxOrder: 2 })).toBe(
      " o     size count  free  segs pages    kB\n\n\n\n",
    );
  });

  it("wraps the buffer list", () => {
    const device = createTestDevice({ dma: { bufferLists: [0, 1, 2, 3, 4] } });
    expect(render(new BufsReport(), device, { bufferListWrap: 2 })).toBe(
      " o     size count  free  segs pages    kB\n\n\n" + " 0 1\n 2 3\n 4\n",
    );
  });
});

describe("ObjectsReport", () => {
  it("reports counts and renders large usage in pages", () => {
    expect(render(new ObjectsReport(), createPopulatedDevice())).toBe(
      "Object accounting:\n\n" +
        "Number of active fence objects: 4.\n" +
        "Number of active buffer objects: 9.\n" +
        "\n" +
        "Memory accounting:\n\n" +
        "Number of locked GATT pages: 16.\n" +
        "Used object memory is 20 pages.\n" +
        "Used emergency memory is 5 bytes.\n" +
        "\n" +
        "Soft object memory usage threshold is 256 pages.\n" +
        "Hard object memory usage threshold is 512 pages.\n" +
        "Emergency root only memory usage threshold is 640 pages.\n" +
        "\n",
    );
  });

  it("switches to pages only above sixteen pages", () => {
    const device = createTestDevice({
      memoryControl: {
        usedMemory: 17 * 4096,
        usedEmergency: 16 * 4096,
        lowThreshold: 0,
        highThreshold: 0,
        emergencyThreshold: 0,
      },
    });
    const text = render(new ObjectsReport(), device);
    expect(text).toContain("Used object memory is 17 pages.\n");
    expect(text).toContain("Used emergency memory is 65536 bytes.\n");
  });

  it("explains unsupported subsystems", () => {
    expect(render(new ObjectsReport(), createTestDevice())).toBe(
      "Object accounting:\n\n" +
        "Fence objects are not supported by this driver\n" +
        "\n" +
        "Memory accounting:\n\n" +
        "Buffer objects are not supported by this driver.\n" +
        "Used object memory is 0 bytes.\n" +
        "Used emergency memory is 0 bytes.\n" +
        "\n" +
        "Soft object memory usage threshold is 0 pages.\n" +
        "Hard object memory usage threshold is 0 pages.\n" +
        "Emergency root only memory usage threshold is 0 pages.\n" +
        "\n",
    );
  });
});

describe("ClientsReport", () => {
  it("lists one row per session", () => {
    expect(render(new ClientsReport(), createPopulatedDevice())).toBe(
      "a dev   pid   uid      magic     ioctls\n\n" +
        "y   0  1200  1000          7         42\n" +
        "n  64  1300     0          0          3\n",
    );
  });
});

describe("GemNamesReport", () => {
  it("lists every named object", () => {
    expect(render(new GemNamesReport(), createPopulatedDevice())).toBe(
      "  name     size handles refcount\n" +
        "     1     4096       1        2\n" +
        "     2  1048576       2        3\n",
    );
  });

  it("stops writing once past the size limit", () => {
    const objects = Array.from({ length: 10 }, (_, i) => ({ name: i + 1, size: 4096 }));
    const device = createTestDevice({ objects });

    const text = render(new GemNamesReport(), device, { pageSize: 256 });
    const rows = text.split("\n").slice(1, -1);

    expect(text).toHaveLength(198);
    expect(rows).toHaveLength(5);
    expect(rows[4]).toBe("     5     4096       0        1");
  });

  it("ends on a whole row with the tightest accepted margin", () => {
    const objects = Array.from({ length: 20 }, (_, i) => ({ name: i + 1, size: 4096 }));
    const device = createTestDevice({ objects });

    const text = render(new GemNamesReport(), device, {
      pageSize: 256,
      sizeLimit: 170,
      bufferCapacity: 250,
    });

    expect(text).toHaveLength(198);
    expect(text.endsWith("     5     4096       0        1\n")).toBe(true);
  });
});

describe("GemObjectsReport", () => {
  it("prints the six summary lines", () => {
    expect(render(new GemObjectsReport(), createPopulatedDevice())).toBe(
      "2 objects\n" +
        "1052672 object bytes\n" +
        "1 pinned\n" +
        "4096 pin bytes\n" +
        "8192 gtt bytes\n" +
        "268435456 gtt total\n",
    );
  });
});

describe("MemReport", () => {
  it("prints summary rows and one row per area", () => {
    expect(render(new MemReport(), createPopulatedDevice())).toBe(
      "                   total counts                  |    outstanding\n" +
        "type      alloc freed fail      bytes      freed | allocs      bytes\n\n" +
        "system        0     0    0       4096 kB         |\n" +
        "locked        0     0    0          8 kB         |\n" +
        "\n" +
        "driver       10     4    0       2048        512 |      6       1536\n",
    );
  });
});

describe("getBuiltinReports", () => {
  it("registers the core reports in order", () => {
    expect(getBuiltinReports({ debug: false }).map((r) => r.name)).toEqual([
      "name",
      "mem",
      "vm",
      "clients",
      "queues",
      "bufs",
      "objects",
      "gem_names",
      "gem_objects",
    ]);
  });

  it("appends vma in debug mode", () => {
    expect(getBuiltinReports({ debug: true }).map((r) => r.name).at(-1)).toBe("vma");
  });

  it("locks only the reports that walk device collections", () => {
    const unlocked = getBuiltinReports({ debug: true })
      .filter((r) => !r.requiresLock)
      .map((r) => r.name);
    expect(unlocked).toEqual(["name", "mem", "gem_objects"]);
  });
});
