import { loadConfig, setConfig, type Config } from "../config";
import { DatasetBuildError } from "../dataset/errors";
import { logger } from "../logger";
import { buildDataset } from "./pipeline";

/**
 * Compile generated/windows-zones.json from the upstream CLDR document
 *
 * Usage: dataset [config.toml]
 */
async function main(): Promise<void> {
  const configPath = process.argv[2] ?? "config.toml";

  let config: Config;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    throw new DatasetBuildError(
      "config",
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }
  setConfig(config);

  const { err } = await buildDataset({
    source: config.dataset.source,
    output: config.dataset.output,
  });
  if (err) {
    throw err;
  }
}

main().catch((error: unknown) => {
  logger.error("Failed to build Windows zones dataset", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
