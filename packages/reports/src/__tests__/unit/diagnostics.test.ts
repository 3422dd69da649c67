import {
  DuplicateReportError,
  ReportNamespaceError,
  ReportNotFoundError,
  ReportRegistrationError,
} from "@devinfo/errors";
import {
  createPopulatedDevice,
  createTestDevice,
  decodeReport,
  MockNamespaceHost,
} from "@devinfo/test-utils";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { DeviceDiagnostics } from "../../diagnostics.js";
import type { ReportDescriptor } from "../../types.js";

const CORE = ["name", "mem", "vm", "clients", "queues", "bufs", "objects", "gem_names", "gem_objects"];

describe("DeviceDiagnostics lifecycle", () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("registers every report under a directory named after the device index", () => {
    const host = new MockNamespaceHost();
    const diagnostics = new DeviceDiagnostics(createTestDevice({ index: 3 }), host);

    expect(diagnostics.init(host.root)).toBe("/proc/3");
    expect(host.createDirectory).toHaveBeenCalledWith("3", "/proc");
    expect(host.entryNames()).toEqual(CORE);
    expect(diagnostics.isRegistered).toBe(true);
  });

  it("adds vma in debug mode", () => {
    const host = new MockNamespaceHost();
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host, { config: { debug: true } });

    diagnostics.init(host.root);
    expect(host.entryNames()).toEqual([...CORE, "vma"]);
  });

  it("returns the existing directory when initialized twice", () => {
    const host = new MockNamespaceHost();
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    diagnostics.init(host.root);
    expect(diagnostics.init(host.root)).toBe("/proc/0");
    expect(host.createDirectory).toHaveBeenCalledTimes(1);
  });

  it("fails without registering anything when the directory is refused", () => {
    const host = new MockNamespaceHost({ failDirectory: "reject" });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    expect(() => diagnostics.init(host.root)).toThrow(ReportNamespaceError);
    expect(host.createEntry).not.toHaveBeenCalled();
    expect(diagnostics.isRegistered).toBe(false);
    expect(errorSpy).toHaveBeenCalledWith("[DeviceDiagnostics] Cannot create /proc/0");
  });

  it("keeps a thrown directory failure as the cause", () => {
    const host = new MockNamespaceHost({ failDirectory: "throw" });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    try {
      diagnostics.init(host.root);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ReportNamespaceError);
      if (error instanceof ReportNamespaceError) {
        expect(error.path).toBe("/proc/0");
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it("rolls back the entries created before a failure in reverse order", () => {
    const host = new MockNamespaceHost({ failEntryAt: 4 });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    try {
      diagnostics.init(host.root);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ReportRegistrationError);
      if (error instanceof ReportRegistrationError) {
        expect(error.message).toBe("Cannot create /proc/0/clients");
        expect(error.reportName).toBe("clients");
        expect(error.rolledBack).toEqual(["vm", "mem", "name"]);
      }
    }

    expect(host.removeEntry.mock.calls).toEqual([
      ["vm", "/proc/0"],
      ["mem", "/proc/0"],
      ["name", "/proc/0"],
    ]);
    expect(host.removeDirectory).toHaveBeenCalledWith("0", "/proc");
    expect(host.entries.size).toBe(0);
    expect(host.directories.has("/proc/0")).toBe(false);
    expect(diagnostics.isRegistered).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("keeps rolling back when a removal fails", () => {
    const host = new MockNamespaceHost({ failEntryAt: 4 });
    host.removeEntry.mockImplementationOnce(() => {
      throw new Error("entry busy");
    });
    host.removeDirectory.mockImplementationOnce(() => {
      throw new Error("directory busy");
    });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    expect(() => diagnostics.init(host.root)).toThrow(ReportRegistrationError);
    expect(host.removeEntry.mock.calls).toEqual([
      ["vm", "/proc/0"],
      ["mem", "/proc/0"],
      ["name", "/proc/0"],
    ]);
    expect(host.removeDirectory).toHaveBeenCalledWith("0", "/proc");
    expect(host.entryNames()).toEqual(["vm"]);
    expect(errorSpy).toHaveBeenCalledWith(
      "[DeviceDiagnostics] Rollback could not remove /proc/0/vm: entry busy",
    );
    expect(errorSpy).toHaveBeenCalledWith(
      "[DeviceDiagnostics] Rollback could not remove /proc/0: directory busy",
    );
    expect(errorSpy).toHaveBeenCalledTimes(3);
    expect(diagnostics.isRegistered).toBe(false);
  });

  it("rolls back nothing when the first entry fails", () => {
    const host = new MockNamespaceHost({ failEntryAt: 1, failEntryMode: "throw" });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    expect(() => diagnostics.init(host.root)).toThrow("Cannot create /proc/0/name");
    expect(host.removeEntry).not.toHaveBeenCalled();
    expect(host.removeDirectory).toHaveBeenCalledTimes(1);
  });

  it("can initialize again after a rolled-back attempt", () => {
    const host = new MockNamespaceHost({ failEntryAt: 2 });
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);

    expect(() => diagnostics.init(host.root)).toThrow(ReportRegistrationError);
    expect(diagnostics.init(host.root)).toBe("/proc/0");
    expect(host.entryNames()).toEqual(CORE);
  });

  it("tears down every entry and the directory exactly once", () => {
    const host = new MockNamespaceHost();
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);
    diagnostics.init(host.root);

    diagnostics.teardown(host.root);
    diagnostics.teardown(host.root);

    expect(host.removeEntry).toHaveBeenCalledTimes(CORE.length);
    expect(host.removeDirectory).toHaveBeenCalledTimes(1);
    expect(host.entries.size).toBe(0);
    expect(diagnostics.isRegistered).toBe(false);
  });

  it("treats teardown before init as a no-op", () => {
    const host = new MockNamespaceHost();
    new DeviceDiagnostics(createTestDevice(), host).teardown(host.root);
    expect(host.removeDirectory).not.toHaveBeenCalled();
  });
});

describe("DeviceDiagnostics reads", () => {
  it("rejects duplicate report names", () => {
    const report: ReportDescriptor = { name: "twice", requiresLock: false, generate: () => {} };
    expect(
      () => new DeviceDiagnostics(createTestDevice(), new MockNamespaceHost(), { reports: [report, report] }),
    ).toThrow(DuplicateReportError);
  });

  it("throws for unknown reports", () => {
    const diagnostics = new DeviceDiagnostics(createTestDevice({ index: 2 }), new MockNamespaceHost());
    expect(() => diagnostics.read("vma", 0, 10)).toThrow(ReportNotFoundError);
    expect(() => diagnostics.read("vma", 0, 10)).toThrow("Report 'vma' is not registered for device 2");
  });

  it("serves reads through the mounted reader", () => {
    const host = new MockNamespaceHost();
    const diagnostics = new DeviceDiagnostics(createTestDevice(), host);
    diagnostics.init(host.root);

    const chunk = host.entries.get("/proc/0/name")?.read(0, 100);
    expect(chunk && decodeReport(chunk.bytes)).toBe("gfx pci:0000:01:00.0\n");
    expect(chunk?.eof).toBe(true);
  });

  it("produces the same text for any chunk size", () => {
    const diagnostics = new DeviceDiagnostics(createPopulatedDevice(), new MockNamespaceHost(), {
      config: { debug: true, architecture: "x64" },
    });

    for (const name of diagnostics.reportNames) {
      const whole = decodeReport(diagnostics.readAll(name, 4096));
      for (const size of [1, 7, 64, 333]) {
        expect(decodeReport(diagnostics.readAll(name, size))).toBe(whole);
      }
    }
  });

  it("holds the state lock only for reports that need it", () => {
    const device = createTestDevice();
    const seen: Record<string, boolean> = {};
    const probe = (name: string, requiresLock: boolean): ReportDescriptor => ({
      name,
      requiresLock,
      generate: ({ device: d }) => {
        seen[name] = d.structLock.isLocked;
      },
    });
    const diagnostics = new DeviceDiagnostics(device, new MockNamespaceHost(), {
      reports: [probe("locked", true), probe("free", false)],
    });

    diagnostics.read("locked", 0, 10);
    diagnostics.read("free", 0, 10);

    expect(seen).toEqual({ locked: true, free: false });
    expect(device.structLock.isLocked).toBe(false);
  });

  it("reflects device changes between chunks", () => {
    const device = createTestDevice();
    const diagnostics = new DeviceDiagnostics(device, new MockNamespaceHost());

    const first = diagnostics.read("name", 0, 4);
    device.unique = "renamed";
    const second = diagnostics.read("name", 4, 100);

    expect(decodeReport(first.bytes) + decodeReport(second.bytes)).toBe(
      "gfx pci:0000:01:00.0 renamed\n",
    );
  });
});

describe("ReportSession", () => {
  it("serves every chunk from one rendering", () => {
    const device = createTestDevice();
    const diagnostics = new DeviceDiagnostics(device, new MockNamespaceHost());

    const session = diagnostics.openSession("name");
    const first = session.read(0, 4);
    device.unique = "renamed";
    const rest = session.read(4, 100);

    expect(decodeReport(first.bytes) + decodeReport(rest.bytes)).toBe("gfx pci:0000:01:00.0\n");
    expect(rest.eof).toBe(true);
  });

  it("drains to the same bytes as a single read", () => {
    const diagnostics = new DeviceDiagnostics(createPopulatedDevice(), new MockNamespaceHost());
    const session = diagnostics.openSession("queues");
    expect(decodeReport(session.readAll(5))).toBe(decodeReport(diagnostics.readAll("queues", 4096)));
  });

  it("returns nothing once closed", () => {
    const diagnostics = new DeviceDiagnostics(createTestDevice(), new MockNamespaceHost());
    const session = diagnostics.openSession("gem_objects");
    expect(session.length).toBeGreaterThan(0);

    session.close();
    expect(session.closed).toBe(true);
    expect(session.read(0, 10)).toEqual({ bytes: new Uint8Array(0), eof: true });
  });
});
