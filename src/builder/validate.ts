import { IANAZone } from "luxon";
import { DatasetBuildError } from "../dataset/errors";
import type { WindowsZone } from "../dataset/types";
import { logger } from "../logger";
import { Result } from "../type/result";
import type { RawZone } from "./parse";

/**
 * Upstream does not reliably pair this name with UTC, but Windows
 * reports it as the standard name of the "UTC" key
 */
export const UTC_ZONE: WindowsZone = {
  zone: "Coordinated Universal Time",
  territory: null,
  iana: ["Etc/UTC"],
};

/**
 * Split a <mapZone type="..."> attribute into IANA names, dropping repeats
 */
export function splitTypes(types: string): string[] {
  return [...new Set(types.split(/[\s,]+/).filter((name) => name.length > 0))];
}

function describeZone(raw: RawZone): string {
  return raw.territory ? `"${raw.zone}" (${raw.territory})` : `"${raw.zone}"`;
}

/**
 * Validate every IANA name and append the synthetic UTC record
 *
 * A single invalid name fails the whole set: nothing unvalidated may
 * reach the dataset. Repeated (zone, territory) pairs keep their first
 * occurrence.
 *
 * @param rawZones Records in document order
 * @returns Result<WindowsZone[]> in document order, UTC record last
 */
export function validateZones(rawZones: readonly RawZone[]): Result<WindowsZone[]> {
  const zones: WindowsZone[] = [];
  const seen = new Set<string>();

  for (const raw of rawZones) {
    const iana = splitTypes(raw.types);
    if (iana.length === 0) {
      return Result<WindowsZone[]>(
        new DatasetBuildError("validate", `No IANA timezone listed for ${describeZone(raw)}`)
      );
    }

    const invalid = iana.find((name) => !IANAZone.isValidZone(name));
    if (invalid !== undefined) {
      return Result<WindowsZone[]>(
        new DatasetBuildError(
          "validate",
          `Invalid IANA timezone "${invalid}" listed for ${describeZone(raw)}`
        )
      );
    }

    const key = `${raw.zone}\u0000${raw.territory ?? ""}`;
    if (seen.has(key)) {
      logger.warn("Skipping duplicate mapping", {
        zone: raw.zone,
        territory: raw.territory,
      });
      continue;
    }
    seen.add(key);

    zones.push({ zone: raw.zone, territory: raw.territory, iana });
  }

  zones.push({ ...UTC_ZONE, iana: [...UTC_ZONE.iana] });
  return Result(zones);
}
