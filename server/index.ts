import { createApp } from "./app";
import { createAuditRuntime } from "./audit";
import { errorMessage } from "./audit/errors";
import { loadLocalEnvFiles, readEnv } from "./config";
import { createProspectStore } from "./prospects";

async function main(): Promise<void> {
  loadLocalEnvFiles();
  const env = readEnv();

  const runtime = await createAuditRuntime({
    apiKey: env.ANTHROPIC_API_KEY,
    executablePath: env.CHROMIUM_PATH,
  });
  const store = createProspectStore(env.DATABASE_URL);

  const { httpServer } = await createApp({
    auditor: runtime.auditor,
    createBatch: runtime.createBatch,
    store,
  });

  httpServer.listen(env.PORT, () => {
    console.log(`[server] Listening on http://localhost:${env.PORT} (renderer: ${runtime.config.renderer})`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    httpServer.close();
    Promise.all([runtime.close(), store.close()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`[server] Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error(`[server] Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
