import { buildServer } from "./api/server.js";
import { createFunctionContext } from "./core/services/function-context.js";

const context = createFunctionContext();
const { port, host } = context.config;

const app = buildServer({ context });

let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  console.log(`\n${signal} received. Shutting down gracefully...`);
  try {
    await app.close();
    console.log("Function runtime closed. Goodbye.");
  } catch (error) {
    console.error("Error during shutdown:", error);
    process.exitCode = 1;
  }
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

app
  .listen({ port, host })
  .then(() => {
    const scope = context.config.auth.identity.isPublic ? "public" : "private";
    console.log(`Function runtime (${scope}) listening on http://${host}:${port}`);
  })
  .catch((error) => {
    console.error("Failed to start function runtime:", error);
    process.exitCode = 1;
  });
