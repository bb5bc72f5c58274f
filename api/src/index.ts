import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { HouseholdScheduler } from "./scheduler.js";

async function main() {
  const config = loadConfig();
  const scheduler = new HouseholdScheduler({ config });
  await scheduler.init();
  scheduler.start();

  const app = createApp(scheduler, config);
  const server = app.listen(config.port, () =>
    console.log(`API listening on :${config.port} (window ±${config.triggerWindowSeconds}s, expiry ${config.expiryMinutes}min)`),
  );

  // the tick source goes first, then the server
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    scheduler.stop();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
