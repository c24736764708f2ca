import { DateTime } from "luxon";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { Result } from "../type/result";
import { parseTimeZone } from "../utils/timezone";
import { DatasetUnavailableError, UnknownTimezoneError } from "./errors";
import {
  DatasetArtifactSchema,
  type DatasetArtifact,
  type DatasetVersion,
  type WindowsZone,
} from "./types";

/**
 * Location of the artifact written by the dataset builder,
 * resolved the same way from src/dataset and dist/dataset
 */
export const BUNDLED_DATASET_PATH = join(
  __dirname,
  "..",
  "..",
  "generated",
  "windows-zones.json"
);

/**
 * Version metadata as held at run time
 */
export type FrozenDatasetVersion = Readonly<
  Omit<DatasetVersion, "sourceVersion"> & {
    sourceVersion: readonly [string, string];
  }
>;

/**
 * Read-only view over the CLDR WindowsZones dataset
 *
 * Records keep the upstream order, so "first match" lookups always return
 * the same record for a given build.
 */
export class WindowsZones {
  private readonly zones: readonly Readonly<WindowsZone>[];
  private readonly meta: FrozenDatasetVersion;

  constructor(artifact: DatasetArtifact) {
    this.zones = Object.freeze(
      artifact.zones.map((zone) =>
        Object.freeze({ ...zone, iana: [...zone.iana] })
      )
    );
    const [otherVersion, typeVersion] = artifact.version.sourceVersion;
    this.meta = Object.freeze({
      ...artifact.version,
      sourceVersion: Object.freeze([otherVersion, typeVersion] as const),
    });
  }

  /**
   * Load and validate a compiled dataset artifact
   * @throws DatasetUnavailableError if the file is missing or does not match the schema
   */
  static load(path: string = BUNDLED_DATASET_PATH): WindowsZones {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new DatasetUnavailableError(
        path,
        error instanceof Error ? error.message : String(error)
      );
    }

    const parsed = DatasetArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DatasetUnavailableError(path, z.prettifyError(parsed.error));
    }
    return new WindowsZones(parsed.data);
  }

  /**
   * Returns a record only if it is registered in the dataset
   *
   * If no territory is provided, returns the first record with a matching
   * zone name, whatever its territory.
   */
  get(zone: string, territory?: string): Readonly<WindowsZone> | undefined {
    return this.zones.find(
      (entry) =>
        entry.zone === zone &&
        (territory === undefined || entry.territory === territory)
    );
  }

  /**
   * Reverse lookup: first record listing the IANA identifier among its candidates
   */
  fromIana(timeZone: string): Result<Readonly<WindowsZone>> {
    const name = parseTimeZone(timeZone) ?? timeZone.trim();
    const found = this.zones.find(
      (entry) => entry.iana.includes(name) || entry.iana.includes(timeZone)
    );
    if (!found) {
      return Result<Readonly<WindowsZone>>(new UnknownTimezoneError(timeZone));
    }
    return Result(found);
  }

  /**
   * Canonical IANA identifier of a record
   */
  toIana(zone: Readonly<WindowsZone>): string {
    const [canonical] = zone.iana;
    if (canonical === undefined) {
      throw new Error(`Record "${zone.zone}" has no IANA candidate`);
    }
    return canonical;
  }

  /** All records, in build order */
  entries(): readonly Readonly<WindowsZone>[] {
    return this.zones;
  }

  /** Version metadata embedded at build time */
  version(): FrozenDatasetVersion {
    return this.meta;
  }

  /** Upstream [otherVersion, typeVersion] pair */
  sourceVersion(): readonly [string, string] {
    return this.meta.sourceVersion;
  }

  /** When the dataset was compiled, if recorded */
  buildDate(): DateTime | null {
    if (!this.meta.buildTimestamp) {
      return null;
    }
    const date = DateTime.fromISO(this.meta.buildTimestamp, { zone: "utc" });
    return date.isValid ? date : null;
  }

  /** Content hash of the compiled dataset, if recorded */
  hash(): string | null {
    return this.meta.contentHash;
  }
}

/**
 * Process-wide dataset, loaded on first access and never reloaded
 */
let bundled: WindowsZones | null = null;

/**
 * Get the bundled dataset
 * @throws DatasetUnavailableError if the dataset has not been built
 */
export function getWindowsZones(): WindowsZones {
  if (!bundled) {
    bundled = WindowsZones.load();
  }
  return bundled;
}
