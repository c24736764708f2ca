import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { DatasetBuildError } from "../dataset/errors";
import type { DatasetArtifact } from "../dataset/types";
import { Result } from "../type/result";

/**
 * Serialize the dataset in the layout the run-time loader reads
 */
export function renderDataset(artifact: DatasetArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

/**
 * Write the dataset artifact, creating parent directories
 * @returns Result<string> with the absolute path written
 */
export async function writeDataset(
  path: string,
  artifact: DatasetArtifact
): Promise<Result<string>> {
  const target = resolve(path);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, renderDataset(artifact), "utf-8");
    return Result(target);
  } catch (error) {
    return Result<string>(
      new DatasetBuildError(
        "emit",
        `Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    );
  }
}
