import { z } from "zod";

/**
 * Known Microsoft Windows timezone and the IANA zones it stands for
 */
export const WindowsZoneSchema = z.object({
  // Windows registry key name, e.g. "W. Europe Standard Time"
  zone: z.string().min(1),
  // ISO region code, "001" marks CLDR's default territory
  territory: z.string().min(1).nullable(),
  // First entry is the canonical mapping
  iana: z.array(z.string().min(1)).min(1),
});

/**
 * Metadata regarding the build and the upstream dataset
 */
export const DatasetVersionSchema = z.object({
  buildTimestamp: z.string().nullable(),
  // [otherVersion, typeVersion] from <mapTimezones>
  sourceVersion: z.tuple([z.string(), z.string()]),
  // 64-bit content hash as 16 lowercase hex digits
  contentHash: z
    .string()
    .regex(/^[0-9a-f]{16}$/)
    .nullable(),
});

/**
 * Layout of the compiled dataset artifact
 */
export const DatasetArtifactSchema = z.object({
  version: DatasetVersionSchema,
  zones: z.array(WindowsZoneSchema),
});

export type WindowsZone = z.infer<typeof WindowsZoneSchema>;
export type DatasetVersion = z.infer<typeof DatasetVersionSchema>;
export type DatasetArtifact = z.infer<typeof DatasetArtifactSchema>;
