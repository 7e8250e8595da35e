import {
  ConfigurationError,
  createLogger,
  createRelayMetrics,
  describeError,
  loadRelayRuntimeConfig,
  parseLogLevel
} from "@camrelay/shared";
import { loadRelayConfig } from "./config.js";
import { buildRelay } from "./relay.js";

const SERVICE_NAME = "camrelay";
const logger = createLogger(SERVICE_NAME, { level: parseLogLevel(process.env.LOG_LEVEL) });

async function main(): Promise<void> {
  const runtime = loadRelayRuntimeConfig(SERVICE_NAME, 3020);
  const config = loadRelayConfig(runtime.configPath);
  const metrics = createRelayMetrics();
  const { supervisor, server } = buildRelay({ config, runtime, logger, metrics });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.warn("shutdown signal", { signal });
    try {
      await supervisor.stop();
      await server.close();
      process.exit(0);
    } catch (error) {
      logger.error("shutdown failed", { error: describeError(error) });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });

  await server.listen({ host: "0.0.0.0", port: runtime.port });
  logger.info("service started", { port: runtime.port, cameras: config.cameras.length, bots: config.bots.size });
  await supervisor.start();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error("configuration rejected", { issues: error.issues });
  } else {
    logger.error("service start failed", { error: describeError(error) });
  }
  process.exit(1);
});
