import { existsSync, readFileSync } from "fs";
import { resolve as pathResolve } from "path";
import { BannerDisplayConfig, parseBannerDisplayConfig } from "../display/BannerDisplayConfig";

export const DEFAULT_DISPLAY_CONFIG_PATH = pathResolve(__dirname, "..", "..", "config", "banner-display.json");

// Reads and validates the display configuration file once at startup.
// An explicitly configured path must exist; the default path may be absent.
export function loadBannerDisplayConfig(explicitPath?: string): BannerDisplayConfig {
  const path = explicitPath ? pathResolve(explicitPath) : DEFAULT_DISPLAY_CONFIG_PATH;

  if (!existsSync(path)) {
    if (explicitPath) {
      throw new Error(`Banner display configuration not found: ${path}`);
    }
    console.warn(`[Banners] No display configuration at ${path}; using built-in defaults`);
    return new BannerDisplayConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new Error(`Banner display configuration is not valid JSON (${path}): ${err instanceof Error ? err.message : String(err)}`);
  }

  const config = parseBannerDisplayConfig(raw);
  console.log(
    `[Banners] Display configuration loaded from ${path} (include: ${config.includeIds.size}, exclude: ${config.excludeIds.size})`,
  );
  return config;
}
