import { loadConfig } from "./config";
import { createLogger, setLogLevel } from "./logger";
import { describeUrls, getLanAddresses } from "./network";
import { startServer } from "./server";

const log = createLogger("server");

// Boot the server from environment variables and command-line flags.
async function main() {
  const config = loadConfig(process.env, process.argv.slice(2));
  setLogLevel(config.logLevel);

  const server = await startServer(config);
  log.info(`listening on ${config.host}:${server.port}`);
  log.info(
    `files are kept in memory for ${config.fileTtlSeconds}s and never written to disk`,
  );
  for (const url of describeUrls(config.host, server.port, getLanAddresses())) {
    log.info(`open ${url}`);
  }

  const shutdown = (signal: string) => {
    log.info(`received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        log.error("shutdown failed", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  log.error("failed to start", error);
  process.exit(1);
});
