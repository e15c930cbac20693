/**
 * Environment-driven settings for the translator and its cache.
 *
 * | Variable                     | Default               |
 * | ---------------------------- | --------------------- |
 * | SIGNGLOSS_CACHE              | on (on, off, memory)  |
 * | SIGNGLOSS_CACHE_PATH         | ~/.signgloss/cache    |
 * | SIGNGLOSS_CACHE_TTL          | 86400 (seconds)       |
 * | SIGNGLOSS_CACHE_MAX_ENTRIES  | unbounded             |
 * | SIGNGLOSS_ASSETS_PATH        | ~/.signgloss/assets   |
 * | SIGNGLOSS_ASSET_NAMING       | timestamp             |
 */
import { getDefaultAssetsPath, getDefaultCachePath } from "./paths";
import type { NamingStrategy } from "./sign/types";

export type CacheMode = "on" | "off" | "memory";

export interface SignGlossConfig {
  cacheMode: CacheMode;
  cachePath: string;
  cacheTtlSeconds: number;
  cacheMaxEntries: number | undefined;
  assetsPath: string;
  naming: NamingStrategy;
}

export const DEFAULT_CACHE_TTL_SECONDS = 86400;

export function isCacheMode(value: string): value is CacheMode {
  return value === "on" || value === "off" || value === "memory";
}

export function isNamingStrategy(value: string): value is NamingStrategy {
  return value === "timestamp" || value === "content";
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  if (!/^\d+$/.test(raw) || parseInt(raw, 10) <= 0) {
    console.warn(`[config] Ignoring ${name}=${raw}: expected a positive integer`);
    return undefined;
  }
  return parseInt(raw, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SignGlossConfig {
  const rawMode = env.SIGNGLOSS_CACHE?.toLowerCase();
  let cacheMode: CacheMode = "on";
  if (rawMode) {
    if (isCacheMode(rawMode)) cacheMode = rawMode;
    else console.warn(`[config] Ignoring SIGNGLOSS_CACHE=${rawMode}: expected on, off or memory`);
  }

  const rawNaming = env.SIGNGLOSS_ASSET_NAMING?.toLowerCase();
  let naming: NamingStrategy = "timestamp";
  if (rawNaming) {
    if (isNamingStrategy(rawNaming)) naming = rawNaming;
    else console.warn(`[config] Ignoring SIGNGLOSS_ASSET_NAMING=${rawNaming}: expected timestamp or content`);
  }

  return {
    cacheMode,
    cachePath: env.SIGNGLOSS_CACHE_PATH || getDefaultCachePath(),
    cacheTtlSeconds: readPositiveInt(env, "SIGNGLOSS_CACHE_TTL") ?? DEFAULT_CACHE_TTL_SECONDS,
    cacheMaxEntries: readPositiveInt(env, "SIGNGLOSS_CACHE_MAX_ENTRIES"),
    assetsPath: env.SIGNGLOSS_ASSETS_PATH || getDefaultAssetsPath(),
    naming,
  };
}
