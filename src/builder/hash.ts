import { createHash } from "node:crypto";
import type { WindowsZone } from "../dataset/types";
import { Result } from "../type/result";

/**
 * Fingerprint of the dataset used to detect drift between builds
 *
 * The first 64 bits of a SHA-256 digest over the ordered records and
 * both upstream version strings, as 16 lowercase hex digits. Identical
 * input always yields the same value.
 */
export function computeContentHash(
  zones: readonly WindowsZone[],
  sourceVersion: readonly [string, string]
): Result<string> {
  try {
    const canonical = JSON.stringify({
      sourceVersion,
      zones: zones.map((entry) => [entry.zone, entry.territory, entry.iana]),
    });
    const digest = createHash("sha256").update(canonical, "utf8").digest("hex");
    return Result(digest.slice(0, 16));
  } catch (error) {
    return Result<string>(
      error instanceof Error ? error : new Error(`Failed to hash dataset: ${String(error)}`)
    );
  }
}
