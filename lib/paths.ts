/**
 * Default on-disk locations. Everything lives under `~/.signgloss`
 * unless overridden through configuration.
 */
import { homedir } from "os";
import { join } from "path";

export function getDataRoot(): string {
  return join(homedir(), ".signgloss");
}

export function getDefaultCachePath(): string {
  return join(getDataRoot(), "cache");
}

export function getDefaultAssetsPath(): string {
  return join(getDataRoot(), "assets");
}
