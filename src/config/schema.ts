/**
 * Configuration schema for .pyreview.yml files.
 *
 * The file is optional and only covers how a scan runs (which files, how
 * many, how long a parse may take). Rule thresholds are fixed.
 */

import { z } from "zod";

/**
 * File filtering configuration options.
 */
const filesSchema = z
  .object({
    /**
     * Glob patterns, relative to the scan root, for files to skip.
     * Example: ["tests/**", "**\/migrations/*.py"]
     */
    ignore: z.array(z.string()).default([]),
  })
  .strict();

/**
 * Analysis budget options.
 */
const analysisSchema = z
  .object({
    /**
     * Stop starting new files after this many.
     * Default: unlimited
     */
    max_files: z.number().int().positive().optional(),

    /**
     * Abort a single file's parse after this many milliseconds (0 = no limit).
     * Default: 0
     */
    parse_timeout_ms: z.number().int().nonnegative().default(0),
  })
  .strict();

/**
 * Complete .pyreview.yml configuration schema.
 */
export const pyreviewConfigSchema = z
  .object({
    /**
     * Config file version. Currently only version 1 is supported.
     */
    version: z.literal(1).default(1),
    files: filesSchema.default({}),
    analysis: analysisSchema.default({}),
    /**
     * Report path used when the CLI gets no --output.
     */
    output: z.string().min(1).optional(),
  })
  .passthrough();

export type PyreviewConfig = z.infer<typeof pyreviewConfigSchema>;

export const KNOWN_TOP_LEVEL_KEYS = new Set(["version", "files", "analysis", "output"]);

export const DEFAULT_CONFIG: PyreviewConfig = {
  version: 1,
  files: { ignore: [] },
  analysis: { parse_timeout_ms: 0 },
};
