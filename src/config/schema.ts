import { z } from "zod";

export const DEFAULT_DATASET_SOURCE =
  "https://raw.githubusercontent.com/unicode-org/cldr/main/common/supplemental/windowsZones.xml";

export const DEFAULT_DATASET_OUTPUT = "generated/windows-zones.json";

// Dataset builder configuration schema
export const DatasetConfigSchema = z.object({
  source: z.url().default(DEFAULT_DATASET_SOURCE),
  output: z.string().min(1).default(DEFAULT_DATASET_OUTPUT),
});

// Logging configuration schema
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
});

// Root configuration schema
export const ConfigSchema = z.object({
  dataset: DatasetConfigSchema.default({
    source: DEFAULT_DATASET_SOURCE,
    output: DEFAULT_DATASET_OUTPUT,
  }),
  logging: LoggingConfigSchema.optional(),
});

// Type exports
export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
