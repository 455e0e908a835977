import "dotenv/config";
import { logUnhandledError } from "./lib/observability";
import { initSentry } from "./lib/sentry";
import { startServer } from "./server";

initSentry();

startServer().catch((error: unknown) => {
  logUnhandledError({ phase: "server_start", error });
  process.exitCode = 1;
});
