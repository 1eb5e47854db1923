/**
 * Command-line option schema
 * Commander hands every value over as a string, so numbers are coerced here
 */

import { z } from "zod";

export const ConvertOptionsSchema = z
  .object({
    input: z.string().optional(),
    output: z.string().optional(),
    config: z.string().optional(),
    timeout: z.coerce.number().optional(),
    recurse: z.boolean().optional(),
    recurseLevels: z.coerce.number().int().nonnegative().optional(),
    ignoreErrors: z.boolean().optional(),
    log: z.boolean().optional(),
    logFile: z.string().optional(),
    preview: z.boolean().optional(),
    renumber: z.boolean().optional(),
    scanStart: z.coerce.number().int().nonnegative().optional(),
    scanEnd: z.coerce.number().int().nonnegative().optional(),
    verbose: z.boolean().optional(),
  })
  .refine(
    (o) => !o.scanStart || !o.scanEnd || o.scanStart <= o.scanEnd,
    {
      message: "--scan-start must not be greater than --scan-end",
      path: ["scanStart"],
    },
  );

export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;
