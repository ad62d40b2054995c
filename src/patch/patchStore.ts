import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import yaml from "yaml";
import type { PatchInstruction, PatchWriter } from "./types.js";
import type { FormKey } from "../loadOrder/types.js";
import { log } from "../utils/logger.js";

const patchLog = log.withScope("patch");

let schemaSqlCache: string | null = null;

type OverrideRow = {
  form_key: string;
  original_name: string;
  new_name: string;
};

export type PatchExport = {
  version: number;
  plugin: string;
  overrides: Array<{ form_key: string; original_name: string; new_name: string }>;
};

function getSchemaSql(): string {
  if (schemaSqlCache) return schemaSqlCache;
  const schemaPath = path.join(process.cwd(), "src", "patch", "schema.sql");
  schemaSqlCache = fs.readFileSync(schemaPath, "utf8");
  return schemaSqlCache;
}

function ensureDirFor(dbPath: string) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

/**
 * Override store backed by SQLite. Each run starts from an empty patch and
 * holds at most one override per book.
 */
export class SqlitePatchStore implements PatchWriter {
  private seq = 0;
  private readonly insertStmt: Database.Statement<[string, string, string, number, number]>;

  constructor(
    private readonly db: Database.Database,
    readonly pluginName: string,
  ) {
    this.insertStmt = db.prepare<[string, string, string, number, number]>(`
      INSERT INTO book_overrides (form_key, original_name, new_name, seq, created_at_ms)
      VALUES (?, ?, ?, ?, ?)
    `);
  }

  setBookName(instruction: PatchInstruction): void {
    if (this.getOverride(instruction.formKey)) {
      throw new Error(`Override already exists for ${instruction.formKey}`);
    }
    this.seq += 1;
    this.insertStmt.run(instruction.formKey, instruction.originalName, instruction.newName, this.seq, Date.now());
  }

  getOverride(formKey: FormKey): PatchInstruction | undefined {
    const row = this.db
      .prepare<[string], OverrideRow>(
        "SELECT form_key, original_name, new_name FROM book_overrides WHERE form_key = ?",
      )
      .get(formKey);
    return row ? toInstruction(row) : undefined;
  }

  listOverrides(): PatchInstruction[] {
    return this.db
      .prepare<[], OverrideRow>("SELECT form_key, original_name, new_name FROM book_overrides ORDER BY seq")
      .all()
      .map(toInstruction);
  }

  runInTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }
}

function toInstruction(row: OverrideRow): PatchInstruction {
  return { formKey: row.form_key, originalName: row.original_name, newName: row.new_name };
}

/**
 * Open (or create) the patch database, apply the schema and clear any
 * overrides left by a previous run.
 */
export function openPatchStore(dbPath: string, opts: { pluginName: string }): SqlitePatchStore {
  if (dbPath !== ":memory:") ensureDirFor(dbPath);
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
  db.exec(getSchemaSql());

  db.transaction(() => {
    const cleared = db.prepare("DELETE FROM book_overrides").run().changes;
    if (cleared > 0) patchLog.debug(`Cleared ${cleared} overrides from previous run`);
    db.prepare(
      "INSERT INTO patch_meta (key, value) VALUES ('plugin', ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
    ).run(opts.pluginName);
  })();

  patchLog.debug(`Patch store ready at ${dbPath === ":memory:" ? dbPath : path.resolve(dbPath)}`);
  return new SqlitePatchStore(db, opts.pluginName);
}

export function exportPatchYaml(store: SqlitePatchStore): string {
  const data: PatchExport = {
    version: 1,
    plugin: store.pluginName,
    overrides: store.listOverrides().map((o) => ({
      form_key: o.formKey,
      original_name: o.originalName,
      new_name: o.newName,
    })),
  };
  return yaml.stringify(data);
}
