import type { FormKey, QuestRecord, RecordSource } from "../loadOrder/types.js";
import { log } from "../utils/logger.js";

const questLog = log.withScope("quests");

/** Form keys of every book some quest alias points at. */
export type QuestBookIndex = ReadonlySet<FormKey>;

export const EMPTY_QUEST_BOOK_INDEX: QuestBookIndex = new Set<FormKey>();

/**
 * Invert quest -> book references. Each alias contributes its direct object
 * reference and every item reference that resolves to a book; anything else
 * (missing link, non-book record) is skipped.
 */
export function buildQuestBookIndex(
  quests: Iterable<QuestRecord>,
  source: Pick<RecordSource, "resolveBook">,
): QuestBookIndex {
  const index = new Set<FormKey>();
  let questCount = 0;
  let skipped = 0;

  const add = (formKey: FormKey) => {
    const book = source.resolveBook(formKey);
    if (book) {
      index.add(book.formKey);
    } else {
      skipped++;
    }
  };

  for (const quest of quests) {
    questCount++;
    for (const alias of quest.aliases) {
      if (alias.reference) add(alias.reference);
      for (const item of alias.items ?? []) add(item);
    }
  }

  questLog.debug(`Indexed ${index.size} quest books from ${questCount} quests`, { skipped });
  return index;
}
