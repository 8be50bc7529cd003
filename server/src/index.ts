import { createApp } from "./app";
import { loadConfig } from "./config";
import { openFocusClock } from "./focusClock";

async function main() {
  const config = loadConfig();
  const clock = await openFocusClock(config.dataDir, { tickMs: config.tickMs, alarmPollMs: config.alarmPollMs });
  clock.startBackground();

  const server = createApp(clock).listen(config.port, () => console.log(`Server listening on http://localhost:${config.port}`));

  const shutdown = () => {
    console.log("Shutting down");
    server.close();
    clock.close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Pending journal writes failed during shutdown", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("Failed to start", error);
  process.exit(1);
});
