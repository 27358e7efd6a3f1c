import { loadEnvFile, readEnv, resolveCorsOrigins } from "./config/env";

// Load .env before any module that reads process.env.
loadEnvFile();

import { createApp } from "./app";
import { loadBannerDisplayConfig } from "./config/displayConfig";
import { InMemoryBannerService } from "./service/InMemoryBannerService";
import { BannerUseCases } from "./service/BannerUseCases";
import { getBannerPayloadSource } from "./source/SourceFactory";

// ---- Composition root ----
// Every collaborator is constructed here and passed down explicitly.

const env = readEnv();
const corsOrigins = resolveCorsOrigins(env);
const displayConfig = loadBannerDisplayConfig(env.BANNER_DISPLAY_CONFIG);
const service = new InMemoryBannerService();
const useCases = new BannerUseCases(service);
const source = getBannerPayloadSource();

console.log("[Banners] CORS allowed origins:", corsOrigins);

const app = createApp({ service, useCases, displayConfig, source, corsOrigins });

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[Banners] ${signal} received — shutting down gracefully`);
  if (env.DATABASE_URL) {
    const { closeDatabasePool } = await import("./database/connection");
    await closeDatabasePool();
  }
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err) => {
    console.error("[Banners] Shutdown failed:", err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

// ---- Start server ----
// Initial payload comes from the configured source; an empty source starts with no banners.
async function start(): Promise<void> {
  try {
    await useCases.refreshFromSource(source);
  } catch (err) {
    console.error("[Banners] Initial load failed; starting with no banners:", err instanceof Error ? err.message : err);
  }

  app.listen(env.PORT, "0.0.0.0", () => {
    console.log(`[Banners] Server running on port ${env.PORT}`);
    console.log(`[Banners] API health check: http://0.0.0.0:${env.PORT}/api/health`);
    console.log(`[Banners] Environment: ${env.NODE_ENV}`);
    console.log(`[Banners] Payload source: ${source.kind}`);
    console.log(`[Banners] Auth: ${env.DISABLE_AUTH ? "DISABLED (dev mode)" : "JWT enabled"}`);
  });
}

start().catch((err) => {
  console.error("[Banners] Failed to start:", err);
  process.exit(1);
});
