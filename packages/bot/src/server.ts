import { loadConfig } from "./config.js";
import { createApp } from "./index.js";

async function main() {
  const config = loadConfig();

  const app = await createApp({
    signingSecret: config.slackSigningSecret,
    rateLimit: config.rateLimit,
    metricsWindowMinutes: config.metrics.windowMinutes,
    reportIntervalMs: config.metrics.reportIntervalSeconds * 1000,
    slowRequestThresholdMs: config.metrics.slowRequestThresholdMs,
    adminUsers: config.adminUsers,
    env: config.nodeEnv,
    logger: { level: config.logLevel },
  });

  // Background timers would keep test runs alive.
  if (config.nodeEnv !== "test") {
    app.rateLimiter?.start();
    app.reporter.start();
  }

  app.addHook("onClose", async () => {
    app.rateLimiter?.stop();
    await app.reporter.stop();
  });

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
