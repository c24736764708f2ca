import { IANAZone } from "luxon";
import { ResolverRegistry, detectPlatformFamily } from "./resolver";

/**
 * Get the timezone configured on the operating system
 *
 * The lookup strategy depends on the platform family:
 * - Unix: TZ, then well-known files and symlinks
 * - Windows: Intl, then GetTimeZoneInformation translated through the
 *   bundled CLDR WindowsZones dataset
 * - Web: Intl.DateTimeFormat resolved options
 *
 * @returns IANA identifier (e.g. "Europe/Paris"), or undefined if none of
 * the sources yielded a valid one
 */
export function getSystemTimeZone(): string | undefined {
  return ResolverRegistry.get(detectPlatformFamily()).resolve();
}

/**
 * Same as getSystemTimeZone(), as a luxon zone ready for date arithmetic
 */
export function getSystemZone(): IANAZone | undefined {
  const name = getSystemTimeZone();
  return name === undefined ? undefined : IANAZone.create(name);
}

export * from "./dataset/errors";
export type { DatasetArtifact, DatasetVersion, WindowsZone } from "./dataset/types";
export { WindowsZones, getWindowsZones } from "./dataset/windows-zones";
export type { FrozenDatasetVersion } from "./dataset/windows-zones";
export * from "./resolver";
export { Result } from "./type/result";
export { parseTimeZone } from "./utils/timezone";
