import { describe, it, expect } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { getDataRoot, getDefaultAssetsPath, getDefaultCachePath } from "@/lib/paths";

describe("paths", () => {
  it("roots everything under ~/.signgloss", () => {
    expect(getDataRoot()).toBe(join(homedir(), ".signgloss"));
    expect(getDefaultCachePath()).toBe(join(homedir(), ".signgloss", "cache"));
    expect(getDefaultAssetsPath()).toBe(join(homedir(), ".signgloss", "assets"));
  });
});
