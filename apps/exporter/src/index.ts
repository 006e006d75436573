import {
  ConfigError,
  configureLogger,
  getErrorMessage,
  getLogger,
} from "@llm-cost-monitor/core";
import { loadConfig, type AppConfig } from "./lib/env";
import { createMonitor, printStartupSummary, type Monitor } from "./startup";
import { IntervalScheduler } from "./scheduler/interval-scheduler";
import { startMetricsServer } from "./server/app";

const APP_NAME = "llm-cost-monitor";

function bootstrap(): { config: AppConfig; monitor: Monitor } {
  const config = loadConfig();
  configureLogger({ enabled: true, level: config.logLevel, prefix: APP_NAME });

  const monitor = createMonitor(config, getLogger());
  printStartupSummary(config, monitor);
  return { config, monitor };
}

async function main() {
  console.log(`Starting ${APP_NAME}`);

  let started: { config: AppConfig; monitor: Monitor };
  try {
    started = bootstrap();
  } catch (error) {
    // Configuration problems are fatal before the loop begins
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
    } else {
      console.error("Startup failed:", getErrorMessage(error));
    }
    process.exit(1);
  }

  const { config, monitor } = started;
  const logger = getLogger();

  const server = startMetricsServer(monitor.app, config.metricsPort, logger.child("server"));
  const scheduler = new IntervalScheduler(logger.child("scheduler"));
  monitor.poller.start(scheduler, config.pollIntervalMs);

  // Graceful shutdown handler
  const handleShutdown = () => {
    logger.info("Shutting down...");
    monitor.poller.stop();
    scheduler.cancelAll();
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", handleShutdown);
  process.on("SIGTERM", handleShutdown);
}

main().catch((error: unknown) => {
  console.error("Monitor failed to start:", getErrorMessage(error));
  process.exit(1);
});
