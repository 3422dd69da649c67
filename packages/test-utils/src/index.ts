export const PACKAGE_NAME = "@devinfo/test-utils" as const;

export { createPopulatedDevice, createTestDevice, decodeReport } from "./devices.js";
export {
  MockNamespaceHost,
  type MockNamespaceHostOptions,
  type MountedReader,
} from "./namespace-host.js";
