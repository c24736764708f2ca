import { DateTime } from "luxon";
import type { DatasetArtifact } from "../dataset/types";
import { logger } from "../logger";
import { Result } from "../type/result";
import { writeDataset } from "./emit";
import { fetchDocument, type HttpClient } from "./fetch";
import { computeContentHash } from "./hash";
import { parseDocument } from "./parse";
import { validateZones } from "./validate";

export interface CompileOptions {
  /** Clock used for the build timestamp */
  now?: () => DateTime;
}

export interface BuildOptions extends CompileOptions {
  /** Upstream windowsZones.xml location */
  source: string;
  /** Artifact path; nothing is written when omitted */
  output?: string;
  client?: HttpClient;
}

/**
 * Parse, validate, augment and fingerprint a mapping document
 * @param xml Raw windowsZones.xml text
 * @returns Result<DatasetArtifact>, failed at the first stage that fails
 */
export function compileDataset(
  xml: string,
  options: CompileOptions = {}
): Result<DatasetArtifact> {
  const now = options.now ?? (() => DateTime.utc());

  const { data: document, err: parseErr } = parseDocument(xml);
  if (parseErr || !document) {
    return Result<DatasetArtifact>(parseErr ?? new Error("Failed to parse document"));
  }
  logger.debug("Mapping document parsed", {
    otherVersion: document.otherVersion,
    typeVersion: document.typeVersion,
    records: document.zones.length,
  });

  const { data: zones, err: validateErr } = validateZones(document.zones);
  if (validateErr || !zones) {
    return Result<DatasetArtifact>(
      validateErr ?? new Error("Failed to validate records")
    );
  }

  const sourceVersion: [string, string] = [
    document.otherVersion,
    document.typeVersion,
  ];

  let contentHash: string | null = null;
  const { data: hash, err: hashErr } = computeContentHash(zones, sourceVersion);
  if (hashErr) {
    logger.warn("Failed to hash dataset, continuing without a content hash", {
      error: hashErr.message,
    });
  } else {
    contentHash = hash;
  }

  return Result<DatasetArtifact>({
    version: {
      buildTimestamp: now().toUTC().toISO(),
      sourceVersion,
      contentHash,
    },
    zones,
  });
}

/**
 * Fetch -> Parse -> Validate & augment -> Hash -> Emit
 *
 * Any failing stage halts the pipeline; there is no partial output.
 */
export async function buildDataset(
  options: BuildOptions
): Promise<Result<DatasetArtifact>> {
  logger.info("Fetching Windows zones mapping", { source: options.source });
  const { data: xml, err: fetchErr } = await fetchDocument(
    options.source,
    options.client
  );
  if (fetchErr || xml === null) {
    return Result<DatasetArtifact>(fetchErr ?? new Error("Failed to fetch document"));
  }

  const { data: artifact, err: compileErr } = compileDataset(xml, options);
  if (compileErr || !artifact) {
    return Result<DatasetArtifact>(
      compileErr ?? new Error("Failed to compile dataset")
    );
  }
  logger.info("Dataset compiled", {
    zones: artifact.zones.length,
    version: artifact.version.sourceVersion,
    hash: artifact.version.contentHash,
  });

  if (options.output !== undefined) {
    const { data: written, err: emitErr } = await writeDataset(
      options.output,
      artifact
    );
    if (emitErr) {
      return Result<DatasetArtifact>(emitErr);
    }
    logger.info("Dataset written", { path: written });
  }

  return Result(artifact);
}
