/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  path: z.string(),
  // Extensions picked up when the input path is a directory
  extensions: z.array(z.string().startsWith(".")),
  recurse: z.boolean(),
  // 0 recurses without limit; 1 stays in the input directory
  recurseLevels: z.number().int().nonnegative(),
  ignoreErrors: z.boolean(),
});

export const OutputConfigSchema = z.object({
  // Empty means "beside each input file"
  directory: z.string(),
  extension: z.string().startsWith("."),
  renumberScans: z.boolean(),
});

export const ConverterConfigSchema = z.object({
  path: z.string().nullable(),
  // Per converter call; zero or less disables the limit
  timeoutMinutes: z.number(),
  pollIntervalSeconds: z.number().positive(),
  echoOutput: z.boolean(),
});

export const ScansConfigSchema = z.object({
  // 0 leaves that side of the window open
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  logToFile: z.boolean(),
  file: z.string(),
  warnOnMissingScans: z.boolean(),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  converter: ConverterConfigSchema,
  scans: ScansConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  converter: ConverterConfigSchema.partial().optional(),
  scans: ScansConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type ScansConfig = z.infer<typeof ScansConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
