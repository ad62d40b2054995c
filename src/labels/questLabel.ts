import { unsupportedOption } from "./errors.js";
import { containsIgnoreCase } from "./mapMarkerLabel.js";
import type { FixedLabel, LabelFormat, LabelSettings } from "./types.js";
import type { QuestBookIndex } from "../quests/questBookIndex.js";
import type { BookRecord } from "../loadOrder/types.js";

const QUEST_LABEL: FixedLabel = { Long: "Quête", Short: "Q" };

export type QuestLabelResult = {
  label?: string;
  /** Scripts that marked the book as quest-related. Empty when the index matched. */
  questScripts: string[];
};

type QuestLabelSettings = Pick<LabelSettings, "labelFormat" | "assumeBookScriptsAreQuests">;

function questToken(format: LabelFormat): string {
  switch (format) {
    case "Long":
    case "Short":
      return QUEST_LABEL[format];
    case "Star":
      return "*";
    default:
      return unsupportedOption("labelFormat", format);
  }
}

/**
 * A book is quest-related when a quest alias references it, or when one of
 * its scripts looks like a quest script. With assumeBookScriptsAreQuests any
 * attached script counts.
 */
export function getQuestLabel(
  book: BookRecord,
  index: QuestBookIndex,
  settings: QuestLabelSettings,
): QuestLabelResult {
  if (index.has(book.formKey)) {
    return { label: questToken(settings.labelFormat), questScripts: [] };
  }

  const questScripts = book.scripts.filter(
    (script) => settings.assumeBookScriptsAreQuests || containsIgnoreCase(script, "Quest"),
  );
  if (questScripts.length === 0) return { questScripts };

  return { label: questToken(settings.labelFormat), questScripts };
}
