import path from "node:path";
import { afterEach, expect, test, vi } from "vitest";
import { getConfig, loadConfig } from "../config/env.js";
import { resolveRunPaths } from "../dataPaths.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

test("resolveRunPaths prefers explicit overrides", () => {
  const cfg = getConfig();
  const paths = resolveRunPaths({ loadOrderDir: "custom/lo", patchDbPath: ":memory:" });
  expect(paths.loadOrderDir).toBe(path.resolve("custom/lo"));
  expect(paths.patchDbPath).toBe(":memory:");
  expect(paths.settingsPath).toBe(path.resolve(cfg.data.settingsPath));
});

test("resolveRunPaths falls back to configured defaults", () => {
  const cfg = getConfig();
  const paths = resolveRunPaths();
  expect(paths.patchDbPath).toBe(path.resolve(cfg.patch.dbPath));
  expect(paths.loadOrderDir).toBe(path.resolve(cfg.data.loadOrderDir));
});

test("resolveRunPaths uses the config it is given", () => {
  vi.stubEnv("DATA_ROOT", "elsewhere");
  const paths = resolveRunPaths({}, loadConfig());
  expect(paths.loadOrderDir).toBe(path.resolve("elsewhere", "loadOrder"));
  expect(paths.settingsPath).toBe(path.resolve("elsewhere", "settings.yml"));
  expect(paths.patchDbPath).toBe(path.resolve("elsewhere", "patch", "patch.sqlite"));
});

test("an invalid LOG_LEVEL fails when config is loaded, not on import", () => {
  vi.stubEnv("LOG_LEVEL", "loud");
  expect(() => loadConfig()).toThrow("Invalid value for LOG_LEVEL: loud. Allowed: error, warn, info, debug, trace");
});
