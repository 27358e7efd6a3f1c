import { readEnv, type AppEnv } from "../config/env";
import type { BannerPayloadSource } from "./BannerPayloadSource";
import { HttpBannerPayloadSource } from "./HttpBannerPayloadSource";
import { InMemoryBannerPayloadSource } from "./InMemoryBannerPayloadSource";
import { PostgresBannerPayloadSource } from "./PostgresBannerPayloadSource";

// Payload Source Factory
// - The ONLY place where the payload source is selected.
// - DATABASE_URL -> PostgreSQL, else BANNER_SOURCE_URL -> HTTP, else in-memory.

let singleton: BannerPayloadSource | undefined;

export function createBannerPayloadSource(env: AppEnv): BannerPayloadSource {
  if (env.DATABASE_URL) {
    console.log("[Banners] Using PostgreSQL payload source");
    return new PostgresBannerPayloadSource();
  }
  if (env.BANNER_SOURCE_URL) {
    console.log(`[Banners] Using HTTP payload source (${env.BANNER_SOURCE_URL})`);
    return new HttpBannerPayloadSource({ url: env.BANNER_SOURCE_URL, timeoutMs: env.BANNER_SOURCE_TIMEOUT_MS });
  }
  console.log("[Banners] Using in-memory payload source (no DATABASE_URL or BANNER_SOURCE_URL set)");
  return new InMemoryBannerPayloadSource();
}

export function getBannerPayloadSource(): BannerPayloadSource {
  if (!singleton) {
    singleton = createBannerPayloadSource(readEnv());
  }
  return singleton;
}
