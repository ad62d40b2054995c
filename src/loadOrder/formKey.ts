import type { FormKey } from "./types.js";

const FORM_KEY_RE = /^([0-9a-f]{1,6}):(.+\.(?:esm|esp|esl))$/i;

/**
 * Normalize a form key string to "XXXXXX:Plugin.esp".
 * Returns null when the input is not a form key.
 */
export function tryParseFormKey(input: string): FormKey | null {
  const match = FORM_KEY_RE.exec(input.trim());
  if (!match) return null;
  const [, id, plugin] = match;
  return `${id.toUpperCase().padStart(6, "0")}:${plugin}`;
}

export function parseFormKey(input: string, context: string): FormKey {
  const key = tryParseFormKey(input);
  if (!key) throw new Error(`${context}: malformed form key "${input}"`);
  return key;
}

/**
 * Identity used for comparisons. Plugin file names are case-insensitive, so
 * "000801:base.esm" and "000801:Base.esm" name the same record.
 */
export function formKeyId(formKey: FormKey): string {
  const sep = formKey.indexOf(":");
  return `${formKey.slice(0, sep)}:${formKey.slice(sep + 1).toLowerCase()}`;
}
