import { createApp } from "./app";
import { loadConfig } from "./config";
import { createFlightSearchService } from "./flightSearchService";
import { log } from "./logger";
import { createPuppeteerPageOpener } from "./puppeteerSearchPage";

const startServer = () => {
  const config = loadConfig();

  const flightSearch = createFlightSearchService({
    openPage: createPuppeteerPageOpener(config.browser),
    targetUrl: config.flightSearch.targetUrl,
    timings: config.flightSearch.timings,
    useMock: config.flightSearch.useMock,
  });

  const { app } = createApp({ flightSearch, corsOrigins: config.corsOrigins });

  const server = app.listen(config.port, config.host, () => {
    log(`🚀 Server running on http://${config.host}:${config.port}`);
    if (config.flightSearch.useMock) {
      log("⚠️ Mock mode enabled, live scraping is skipped");
    }
  });

  const shutdown = (signal: string) => {
    log(`🔄 Received ${signal}, closing server...`);
    server.close(() => process.exit(0));
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

try {
  startServer();
} catch (error) {
  console.error("❌ Failed to start server:", error);
  process.exit(1);
}
