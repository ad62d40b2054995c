import { composeName } from "../labels/composeLabel.js";
import { collectTags } from "../labels/tagAggregator.js";
import type { LabelSettings } from "../labels/types.js";
import type { RecordSource } from "../loadOrder/types.js";
import { buildQuestBookIndex, EMPTY_QUEST_BOOK_INDEX, type QuestBookIndex } from "../quests/questBookIndex.js";
import type { PatchInstruction, PatchWriter } from "./types.js";
import { log } from "../utils/logger.js";

const patchLog = log.withScope("patch");
const questLog = log.withScope("quests");

export type RunPatchInput = {
  source: RecordSource;
  settings: LabelSettings;
  /** Omit for a dry run: instructions are computed and logged only. */
  writer?: PatchWriter;
};

export type RunPatchResult = {
  instructions: PatchInstruction[];
  questBookCount: number;
  booksSeen: number;
  booksUnnamed: number;
};

export function formatPatchLine(instruction: PatchInstruction): string {
  return `${instruction.formKey}: '${instruction.originalName}' -> '${instruction.newName}'`;
}

/**
 * One pass over the winning books. The quest index is complete before the
 * first book is examined; books keep load-order priority order.
 */
export function runPatch(input: RunPatchInput): RunPatchResult {
  const { source, settings, writer } = input;

  let questBooks: QuestBookIndex = EMPTY_QUEST_BOOK_INDEX;
  if (settings.addQuestLabels) {
    questLog.info("Scanning quests for referenced books...");
    questBooks = buildQuestBookIndex(source.winningQuests(), source);
  }

  const instructions: PatchInstruction[] = [];
  let booksSeen = 0;
  let booksUnnamed = 0;

  for (const book of source.winningBooks()) {
    booksSeen++;
    if (book.name === undefined) {
      booksUnnamed++;
      continue;
    }

    const { tags, questScripts } = collectTags(book, settings, questBooks);
    for (const script of questScripts) {
      questLog.info(`${book.formKey}: '${book.name}' has quest script '${script}'`);
    }
    if (tags.length === 0) continue;

    const instruction: PatchInstruction = {
      formKey: book.formKey,
      originalName: book.name,
      newName: composeName(book.name, tags, settings),
    };
    writer?.setBookName(instruction);
    instructions.push(instruction);
    patchLog.info(formatPatchLine(instruction));
  }

  return {
    instructions,
    questBookCount: questBooks.size,
    booksSeen,
    booksUnnamed,
  };
}
