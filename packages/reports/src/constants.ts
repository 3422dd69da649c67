/**
 * Constants for @devinfo/reports.
 */

import { MAX_BUFFER_ORDER } from "@devinfo/device";

export const PACKAGE_NAME = "@devinfo/reports";
export const PACKAGE_VERSION = "0.1.0";

export const DEFAULT_PAGE_SIZE = 4096;
/** Headroom kept between the report size ceiling and the buffer end. */
export const SIZE_LIMIT_MARGIN = 80;
export const DEFAULT_MAX_ORDER = MAX_BUFFER_ORDER;
/** Buffer list indices printed per line in the `bufs` report. */
export const DEFAULT_BUFFER_LIST_WRAP = 32;
/** Memory figures above this many pages are rendered in pages. */
export const LARGE_MEMORY_PAGES = 16;
export const DEFAULT_CHUNK_SIZE = 1024;

/** Architectures whose VMA lines carry page-protection characters. */
export const X86_ARCHITECTURES: readonly string[] = ["ia32", "x64"];

/** Reports registered for every device, in registration order. */
export const CORE_REPORT_NAMES = [
  "name",
  "mem",
  "vm",
  "clients",
  "queues",
  "bufs",
  "objects",
  "gem_names",
  "gem_objects",
] as const;

/** Registered after the core reports when `debug` is enabled. */
export const DEBUG_REPORT_NAMES = ["vma"] as const;
