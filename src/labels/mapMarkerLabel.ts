import { unsupportedOption } from "./errors.js";
import type { FixedLabel, LabelFormat } from "./types.js";
import type { BookRecord } from "../loadOrder/types.js";

const MAP_MARKER_LABEL: FixedLabel = { Long: "Marqueur carte", Short: "Marqueur" };

export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function findMapMarkerScript(scripts: readonly string[]): string | undefined {
  return scripts.find((script) => containsIgnoreCase(script, "MapMarker"));
}

export function getMapMarkerLabel(book: BookRecord, format: LabelFormat): string | undefined {
  if (book.scripts.length === 0) return undefined;
  if (findMapMarkerScript(book.scripts) === undefined) return undefined;

  switch (format) {
    case "Long":
    case "Short":
      return MAP_MARKER_LABEL[format];
    case "Star":
      return "*";
    default:
      return unsupportedOption("labelFormat", format);
  }
}
