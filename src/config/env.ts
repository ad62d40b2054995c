import "dotenv/config";
import path from "node:path";
import type { Config, LogFormat, LogLevel } from "./types.js";
import { getEnv } from "./rawEnv.js";

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = getEnv(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

export function loadConfig(): Config {
  const dataRoot = getEnv("DATA_ROOT") ?? "./data";

  return {
    data: {
      root: dataRoot,
      loadOrderDir: getEnv("LOAD_ORDER_DIR") ?? path.join(dataRoot, "loadOrder"),
      settingsPath: getEnv("LABEL_SETTINGS_PATH") ?? path.join(dataRoot, "settings.yml"),
    },

    patch: {
      dbPath: getEnv("PATCH_DB_PATH") ?? path.join(dataRoot, "patch", "patch.sqlite"),
      pluginName: getEnv("PATCH_PLUGIN_NAME") ?? "Shelfmark.esp",
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: getEnv("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };
}

export function printConfigSnapshot(cfg: Config): void {
  console.log("=== SHELFMARK CONFIG SNAPSHOT ===");
  console.log(
    JSON.stringify(
      {
        DATA_ROOT: cfg.data.root,
        LOAD_ORDER_DIR: cfg.data.loadOrderDir,
        LABEL_SETTINGS_PATH: cfg.data.settingsPath,
        PATCH_DB_PATH: cfg.patch.dbPath,
        PATCH_PLUGIN_NAME: cfg.patch.pluginName,
        LOG_LEVEL: cfg.logging.level,
        LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
        LOG_FORMAT: cfg.logging.format,
      },
      null,
      2,
    ),
  );
  console.log("=================================");
}

let cached: Config | undefined;

/**
 * Config for this process, loaded on first use so that invalid values
 * surface inside the caller's error handling rather than at import.
 */
export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}
