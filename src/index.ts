/**
 * Command-line entry point
 * deathcue <username> [volume] [server_url]
 */

import { ProcessPlaybackDevice } from "./audio/device";
import { USAGE, loadConfig, type LoadResult } from "./config";
import { InvalidConfigError } from "./errors";
import { logger } from "./logger";
import { EXIT_FAILURE, Runner } from "./runner/runner";

const SHUTDOWN_TIMEOUT_MS = 10000; // 10 seconds timeout

function readConfig(): LoadResult | null {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      console.error(USAGE);
      logger.fatal(error.message);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const loaded = readConfig();
  if (!loaded) return EXIT_FAILURE;

  if (loaded.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const { config } = loaded;
  logger.info(
    { username: config.username, volume: config.volume, url: config.serverUrl },
    "Starting client"
  );

  const runner = new Runner(config, {
    device: new ProcessPlaybackDevice({
      player: config.player,
      requiredClips: [config.deathClip],
    }),
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      // Force exit if graceful shutdown takes too long
      const timeout = setTimeout(() => {
        logger.error("Shutdown timeout reached, forcing exit");
        process.exit(EXIT_FAILURE);
      }, SHUTDOWN_TIMEOUT_MS);
      timeout.unref();

      runner.shutdown(signal);
    });
  }

  return runner.run();
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ error }, "Unhandled error");
    process.exitCode = EXIT_FAILURE;
  }
);
