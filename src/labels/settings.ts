import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import { ConfigurationError } from "./errors.js";
import {
  ENCAPSULATING_CHARACTERS,
  LABEL_FORMATS,
  LABEL_POSITIONS,
  type LabelSettings,
} from "./types.js";
import { log } from "../utils/logger.js";

const labelsLog = log.withScope("labels");

export const DEFAULT_LABEL_SETTINGS: Readonly<LabelSettings> = {
  addSkillLabels: true,
  addMapMarkerLabels: true,
  addQuestLabels: true,
  assumeBookScriptsAreQuests: false,
  labelFormat: "Long",
  labelPosition: "Before",
  encapsulatingCharacters: "Bracket",
};

const KNOWN_KEYS = new Set<string>(Object.keys(DEFAULT_LABEL_SETTINGS));

type BoolOption = "addSkillLabels" | "addMapMarkerLabels" | "addQuestLabels" | "assumeBookScriptsAreQuests";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function boolOf(raw: Record<string, unknown>, key: BoolOption): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return DEFAULT_LABEL_SETTINGS[key];
  if (typeof value !== "boolean") {
    throw new ConfigurationError(key, value, `${key} must be true or false, got ${JSON.stringify(value)}`);
  }
  return value;
}

function enumOf<T extends string>(raw: Record<string, unknown>, key: string, allowed: readonly T[], def: T): T {
  const value = raw[key];
  if (value === undefined || value === null) return def;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ConfigurationError(
      key,
      value,
      `Invalid value for ${key}: ${JSON.stringify(value)}. Allowed: ${allowed.join(", ")}`,
    );
  }
  return match;
}

/**
 * Validate a deserialized settings object. Missing options take their
 * defaults; any value outside an option's recognized set throws.
 */
export function parseLabelSettings(raw: unknown): LabelSettings {
  if (raw === undefined || raw === null) return { ...DEFAULT_LABEL_SETTINGS };
  if (!isRecord(raw)) {
    throw new ConfigurationError("settings", raw, "Label settings must be a mapping");
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) labelsLog.warn(`Ignoring unknown label setting: ${key}`);
  }

  return {
    addSkillLabels: boolOf(raw, "addSkillLabels"),
    addMapMarkerLabels: boolOf(raw, "addMapMarkerLabels"),
    addQuestLabels: boolOf(raw, "addQuestLabels"),
    assumeBookScriptsAreQuests: boolOf(raw, "assumeBookScriptsAreQuests"),
    labelFormat: enumOf(raw, "labelFormat", LABEL_FORMATS, DEFAULT_LABEL_SETTINGS.labelFormat),
    labelPosition: enumOf(raw, "labelPosition", LABEL_POSITIONS, DEFAULT_LABEL_SETTINGS.labelPosition),
    encapsulatingCharacters: enumOf(
      raw,
      "encapsulatingCharacters",
      ENCAPSULATING_CHARACTERS,
      DEFAULT_LABEL_SETTINGS.encapsulatingCharacters,
    ),
  };
}

/**
 * Load label settings from YAML. A missing file means all defaults.
 */
export function loadLabelSettings(settingsPath: string): LabelSettings {
  if (!fs.existsSync(settingsPath)) {
    labelsLog.info(`No settings file at ${settingsPath}, using defaults`);
    return { ...DEFAULT_LABEL_SETTINGS };
  }
  const settings = parseLabelSettings(yaml.parse(fs.readFileSync(settingsPath, "utf-8")));
  labelsLog.debug("Label settings loaded", settings);
  return settings;
}

/**
 * Write the default settings file if missing. Idempotent.
 */
export function ensureLabelSettingsFile(settingsPath: string): void {
  if (fs.existsSync(settingsPath)) return;
  fs.mkdirSync(path.dirname(settingsPath), { recursive: true });
  fs.writeFileSync(settingsPath, yaml.stringify({ ...DEFAULT_LABEL_SETTINGS }));
}
