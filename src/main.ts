/**
 * Entry point for the weather agent server
 */
import { pathToFileURL } from "node:url";
import { WeatherAgentApp } from "./app.js";

/**
 * Start the weather agent application
 */
async function main() {
  const app = new WeatherAgentApp();
  await app.start();

  const shutdown = () => {
    app.stop().then(
      () => process.exit(0),
      (err) => {
        console.error("Error during shutdown:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

// Run if this is the main module
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error("Failed to start weather agent server:", error);
    process.exit(1);
  });
}
