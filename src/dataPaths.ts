import path from "node:path";
import { getConfig } from "./config/env.js";
import type { Config } from "./config/types.js";

export type RunPaths = {
  loadOrderDir: string;
  settingsPath: string;
  patchDbPath: string;
};

export type RunPathOverrides = Partial<RunPaths>;

/**
 * Absolute paths for one run. Explicit overrides (CLI flags) win over the
 * environment-derived defaults. ":memory:" is kept as-is for the patch db.
 */
export function resolveRunPaths(overrides: RunPathOverrides = {}, cfg: Config = getConfig()): RunPaths {
  const patchDbPath = overrides.patchDbPath ?? cfg.patch.dbPath;
  return {
    loadOrderDir: path.resolve(overrides.loadOrderDir ?? cfg.data.loadOrderDir),
    settingsPath: path.resolve(overrides.settingsPath ?? cfg.data.settingsPath),
    patchDbPath: patchDbPath === ":memory:" ? patchDbPath : path.resolve(patchDbPath),
  };
}
