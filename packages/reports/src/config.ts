/**
 * Configuration validation and resolution.
 */

import { ReportConfigurationError, type ValidationIssue } from "@devinfo/errors";
import { z } from "zod";
import {
  DEFAULT_BUFFER_LIST_WRAP,
  DEFAULT_MAX_ORDER,
  DEFAULT_PAGE_SIZE,
  SIZE_LIMIT_MARGIN,
} from "./constants.js";
import type { DiagnosticsConfig, ResolvedDiagnosticsConfig } from "./types.js";

function isPowerOfTwo(value: number): boolean {
  return value > 0 && (value & (value - 1)) === 0;
}

export const DiagnosticsConfigSchema = z
  .object({
    /** Device page size in bytes (default: 4096) */
    pageSize: z
      .number()
      .int()
      .min(256)
      .refine(isPowerOfTwo, { message: "pageSize must be a power of two" })
      .default(DEFAULT_PAGE_SIZE),

    /** Offset past which reads end immediately (default: pageSize - 80, at most bufferCapacity - 80) */
    sizeLimit: z.number().int().positive().optional(),

    /** Bytes one generation may hold (default: pageSize) */
    bufferCapacity: z.number().int().positive().optional(),

    /** Highest buffer-pool order listed by `bufs` (default: 22) */
    maxOrder: z.number().int().min(0).max(31).default(DEFAULT_MAX_ORDER),

    /** Buffer list indices per line in `bufs` (default: 32) */
    bufferListWrap: z.number().int().positive().default(DEFAULT_BUFFER_LIST_WRAP),

    /** Registers the `vma` report (default: false) */
    debug: z.boolean().default(false),

    /** Architecture tag; x86 adds page-protection flags to `vma` (default: process.arch) */
    architecture: z.string().min(1).optional(),
  })
  .strict();

/**
 * Validates and resolves a {@link DiagnosticsConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * @throws {ReportConfigurationError} on invalid input
 */
export function resolveDiagnosticsConfig(config: DiagnosticsConfig = {}): ResolvedDiagnosticsConfig {
  const result = DiagnosticsConfigSchema.safeParse(config);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new ReportConfigurationError(
      issues.map((i) => `${i.field}: ${i.message}`).join("; "),
      issues,
    );
  }

  const parsed = result.data;
  const bufferCapacity = parsed.bufferCapacity ?? parsed.pageSize;
  const sizeLimit = parsed.sizeLimit ?? parsed.pageSize - SIZE_LIMIT_MARGIN;

  // The margin leaves room for the line that crosses sizeLimit to end whole.
  if (bufferCapacity - sizeLimit < SIZE_LIMIT_MARGIN) {
    throw new ReportConfigurationError(
      `sizeLimit (${sizeLimit}) must be at least ${SIZE_LIMIT_MARGIN} bytes below bufferCapacity (${bufferCapacity})`,
      [
        {
          field: "sizeLimit",
          message: `must be at least ${SIZE_LIMIT_MARGIN} bytes below bufferCapacity`,
          code: "too_big",
          value: sizeLimit,
        },
      ],
    );
  }

  return {
    pageSize: parsed.pageSize,
    sizeLimit,
    bufferCapacity,
    maxOrder: parsed.maxOrder,
    bufferListWrap: parsed.bufferListWrap,
    debug: parsed.debug,
    architecture: parsed.architecture ?? process.arch,
  };
}
