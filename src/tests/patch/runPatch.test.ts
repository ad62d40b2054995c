import { describe, expect, test, vi } from "vitest";
import { openPatchStore } from "../../patch/patchStore.js";
import { formatPatchLine, runPatch } from "../../patch/runPatch.js";
import type { PatchInstruction } from "../../patch/types.js";
import type { RecordSource } from "../../loadOrder/types.js";
import { makeBook, makeLoadOrder, makePlugin, makeSettings } from "../fixtures.js";

const skillOnly = makeSettings({ addMapMarkerLabels: false, addQuestLabels: false });

function collectingWriter() {
  const written: PatchInstruction[] = [];
  return { written, setBookName: (instruction: PatchInstruction) => void written.push(instruction) };
}

const library = makeLoadOrder(
  makePlugin("Base.esm", {
    books: [
      makeBook("000801:Base.esm", { name: "Old Tome", teaches: { kind: "skill", skill: "Alchemy" } }),
      makeBook("000802:Base.esm", { name: "Journal" }),
      makeBook("000803:Base.esm", { teaches: { kind: "skill", skill: "Archery" } }),
      makeBook("000804:Base.esm", { name: "Atlas", scripts: ["MapMarkerRevealScript"] }),
      makeBook("000805:Base.esm", { name: "Plain Book", scripts: ["ReadableScript"] }),
    ],
    quests: [{ formKey: "000A01:Base.esm", aliases: [{ items: ["000802:Base.esm"] }] }],
  }),
);

describe("runPatch", () => {
  test("relabels a skill book as in the reference example", () => {
    const result = runPatch({ source: library, settings: skillOnly });
    expect(result.instructions).toEqual([
      { formKey: "000801:Base.esm", originalName: "Old Tome", newName: "[Alchimie] Old Tome" },
    ]);
  });

  test("short, parenthesized, after", () => {
    const settings = makeSettings({
      addMapMarkerLabels: false,
      addQuestLabels: false,
      labelFormat: "Short",
      labelPosition: "After",
      encapsulatingCharacters: "Paren",
    });
    expect(runPatch({ source: library, settings }).instructions[0]?.newName).toBe("Old Tome (Alch)");
  });

  test("star format after the name", () => {
    const settings = makeSettings({ labelFormat: "Star", labelPosition: "After" });
    expect(runPatch({ source: library, settings }).instructions.map((i) => i.newName)).toEqual([
      "Old Tome*",
      "Journal*",
      "Atlas*",
    ]);
  });

  test("tags every kind of book in priority order", () => {
    const result = runPatch({ source: library, settings: makeSettings() });
    expect(result.instructions.map(formatPatchLine)).toEqual([
      "000801:Base.esm: 'Old Tome' -> '[Alchimie] Old Tome'",
      "000802:Base.esm: 'Journal' -> '[Quête] Journal'",
      "000804:Base.esm: 'Atlas' -> '[Marqueur carte] Atlas'",
    ]);
    expect(result.booksSeen).toBe(5);
    expect(result.booksUnnamed).toBe(1);
    expect(result.questBookCount).toBe(1);
  });

  test("assumeBookScriptsAreQuests widens quest detection to any script", () => {
    const settings = makeSettings({ addSkillLabels: false, assumeBookScriptsAreQuests: true });
    expect(runPatch({ source: library, settings }).instructions.map((i) => i.newName)).toEqual([
      "[Quête] Journal",
      "[Marqueur carte/Quête] Atlas",
      "[Quête] Plain Book",
    ]);
  });

  test("books without a name are never patched", () => {
    const unnamed = makeLoadOrder(
      makePlugin("Base.esm", {
        books: [makeBook("000901:Base.esm", { teaches: { kind: "skill", skill: "Speech" }, scripts: ["QuestScript"] })],
      }),
    );
    const result = runPatch({ source: unnamed, settings: makeSettings({ assumeBookScriptsAreQuests: true }) });
    expect(result.instructions).toEqual([]);
    expect(result.booksUnnamed).toBe(1);
  });

  test("no labels enabled produces no instructions", () => {
    const settings = makeSettings({ addSkillLabels: false, addMapMarkerLabels: false, addQuestLabels: false });
    const writer = collectingWriter();
    expect(runPatch({ source: library, settings, writer }).instructions).toEqual([]);
    expect(writer.written).toEqual([]);
  });

  test("skips the quest scan when quest labels are off", () => {
    const source: RecordSource = {
      winningBooks: () => [makeBook("000801:Base.esm", { name: "Old Tome" })],
      winningQuests: vi.fn(() => []),
      resolveBook: vi.fn(() => undefined),
    };
    const result = runPatch({ source, settings: skillOnly });
    expect(source.winningQuests).not.toHaveBeenCalled();
    expect(source.resolveBook).not.toHaveBeenCalled();
    expect(result.questBookCount).toBe(0);
  });

  test("hands every instruction to the writer once", () => {
    const writer = collectingWriter();
    const result = runPatch({ source: library, settings: makeSettings(), writer });
    expect(writer.written).toEqual(result.instructions);
  });

  test("writes overrides into the patch store", () => {
    const store = openPatchStore(":memory:", { pluginName: "Test.esp" });
    const result = store.runInTransaction(() => runPatch({ source: library, settings: skillOnly, writer: store }));
    expect(store.listOverrides()).toEqual(result.instructions);
    store.close();
  });
});
