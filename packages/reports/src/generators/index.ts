import type { ReportDescriptor, ResolvedDiagnosticsConfig } from "../types.js";
import { BufsReport } from "./bufs.js";
import { ClientsReport } from "./clients.js";
import { GemNamesReport } from "./gem-names.js";
import { GemObjectsReport } from "./gem-objects.js";
import { MemReport } from "./mem.js";
import { NameReport } from "./name.js";
import { ObjectsReport } from "./objects.js";
import { QueuesReport } from "./queues.js";
import { VmReport } from "./vm.js";
import { VmaReport } from "./vma.js";

export { BufsReport } from "./bufs.js";
export { ClientsReport } from "./clients.js";
export { GemNamesReport } from "./gem-names.js";
export { GemObjectsReport } from "./gem-objects.js";
export { MemReport } from "./mem.js";
export { NameReport } from "./name.js";
export { ObjectsReport } from "./objects.js";
export { QueuesReport } from "./queues.js";
export { mapTypeTag, VmReport } from "./vm.js";
export { isX86, pageProtectionFlags, VmaReport } from "./vma.js";

/**
 * Returns the built-in reports in registration order. `vma` is appended
 * only when `debug` is set.
 */
export function getBuiltinReports(config: Pick<ResolvedDiagnosticsConfig, "debug">): readonly ReportDescriptor[] {
  const reports: ReportDescriptor[] = [
    new NameReport(),
    new MemReport(),
    new VmReport(),
    new ClientsReport(),
    new QueuesReport(),
    new BufsReport(),
    new ObjectsReport(),
    new GemNamesReport(),
    new GemObjectsReport(),
  ];
  if (config.debug) {
    reports.push(new VmaReport());
  }
  return reports;
}
