import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import yaml from "yaml";
import { describe, expect, test } from "vitest";
import { exportPatchYaml, openPatchStore } from "../../patch/patchStore.js";

const oldTome = { formKey: "000801:Base.esm", originalName: "Old Tome", newName: "[Alchimie] Old Tome" };
const journal = { formKey: "000802:Base.esm", originalName: "Journal", newName: "[Quête] Journal" };

describe("SqlitePatchStore", () => {
  test("stores overrides in insertion order", () => {
    const store = openPatchStore(":memory:", { pluginName: "Test.esp" });
    store.setBookName(journal);
    store.setBookName(oldTome);

    expect(store.listOverrides()).toEqual([journal, oldTome]);
    expect(store.getOverride("000801:Base.esm")).toEqual(oldTome);
    expect(store.getOverride("000803:Base.esm")).toBeUndefined();
    store.close();
  });

  test("allows one override per book", () => {
    const store = openPatchStore(":memory:", { pluginName: "Test.esp" });
    store.setBookName(oldTome);
    expect(() => store.setBookName({ ...oldTome, newName: "Old Tome*" })).toThrow(
      "Override already exists for 000801:Base.esm",
    );
    expect(store.listOverrides()).toEqual([oldTome]);
    store.close();
  });

  test("rolls back the whole run when a transaction throws", () => {
    const store = openPatchStore(":memory:", { pluginName: "Test.esp" });
    expect(() =>
      store.runInTransaction(() => {
        store.setBookName(oldTome);
        throw new Error("abort");
      }),
    ).toThrow("abort");
    expect(store.listOverrides()).toEqual([]);
    store.close();
  });

  test("reopening a database starts a fresh patch", () => {
    const dbPath = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "shelfmark-patch-")), "out", "patch.sqlite");

    const first = openPatchStore(dbPath, { pluginName: "Test.esp" });
    first.setBookName(oldTome);
    first.close();

    const second = openPatchStore(dbPath, { pluginName: "Test.esp" });
    expect(second.listOverrides()).toEqual([]);
    second.setBookName(oldTome);
    expect(second.listOverrides()).toEqual([oldTome]);
    second.close();
  });

  test("exports the patch as YAML", () => {
    const store = openPatchStore(":memory:", { pluginName: "Test.esp" });
    store.setBookName(oldTome);

    expect(yaml.parse(exportPatchYaml(store))).toEqual({
      version: 1,
      plugin: "Test.esp",
      overrides: [{ form_key: "000801:Base.esm", original_name: "Old Tome", new_name: "[Alchimie] Old Tome" }],
    });
    store.close();
  });
});
