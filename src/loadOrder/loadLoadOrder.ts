import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";
import { formKeyId, parseFormKey } from "./formKey.js";
import { log } from "../utils/logger.js";
import type {
  BookRecord,
  BookTeaches,
  FormKey,
  GameRecord,
  OtherRecord,
  PluginContents,
  PluginEntry,
  QuestAlias,
  QuestRecord,
  RawAlias,
  RawBook,
  RawOther,
  RawPluginsYaml,
  RawPluginYaml,
  RawQuest,
  RecordSource,
  SkillValue,
} from "./types.js";

const loadOrderLog = log.withScope("load-order");

const INVALID_SKILL_TOKENS = new Set(["-1", "none", ""]);

function toSkillValue(raw: string | number | null | undefined): SkillValue {
  if (raw == null) return null;
  const text = String(raw).trim();
  if (INVALID_SKILL_TOKENS.has(text.toLowerCase())) return null;
  return text;
}

function toTeaches(raw: RawBook["teaches"], context: string): BookTeaches | undefined {
  if (!raw) return undefined;
  if (raw.spell != null) {
    return { kind: "spell", spell: parseFormKey(raw.spell, `${context} teaches.spell`) };
  }
  if ("skill" in raw) {
    return { kind: "skill", skill: toSkillValue(raw.skill) };
  }
  return undefined;
}

function requireFormKey(raw: { form_key?: string | number | null } | null, context: string): FormKey {
  if (raw?.form_key == null || raw.form_key === "") throw new Error(`${context} missing form_key`);
  return parseFormKey(String(raw.form_key), context);
}

function toScripts(raw: unknown, formKey: FormKey): string[] {
  if (raw == null) return [];
  if (!Array.isArray(raw)) throw new Error(`Book ${formKey}: scripts must be a list`);
  return raw.map((s) => String(s));
}

function toBook(raw: RawBook | null, plugin: string): BookRecord {
  const formKey = requireFormKey(raw, `Book in ${plugin}`);
  const book: BookRecord = { formKey, scripts: toScripts(raw?.scripts, formKey) };
  if (raw?.name != null) book.name = String(raw.name);
  const teaches = toTeaches(raw?.teaches, `Book ${formKey}`);
  if (teaches) book.teaches = teaches;
  return book;
}

function toAlias(raw: RawAlias | null, context: string): QuestAlias {
  const alias: QuestAlias = {};
  if (!raw) return alias;
  if (raw.reference != null && raw.reference !== "") {
    alias.reference = parseFormKey(String(raw.reference), `${context} reference`);
  }
  if (raw.items != null) {
    if (!Array.isArray(raw.items)) throw new Error(`${context}: items must be a list`);
    alias.items = raw.items.map((item) => parseFormKey(String(item), `${context} item`));
  }
  return alias;
}

function toQuest(raw: RawQuest | null, plugin: string): QuestRecord {
  const formKey = requireFormKey(raw, `Quest in ${plugin}`);
  const aliases = (raw?.aliases ?? []).map((rawAlias, i) => toAlias(rawAlias, `Quest ${formKey} alias #${i}`));

  const quest: QuestRecord = { formKey, aliases };
  if (raw?.name != null) quest.name = String(raw.name);
  return quest;
}

function toOther(raw: RawOther | null, plugin: string): OtherRecord {
  const formKey = requireFormKey(raw, `Record in ${plugin}`);
  const other: OtherRecord = { formKey, type: raw?.type?.trim() || "other" };
  if (raw?.name != null) other.name = String(raw.name);
  return other;
}

/**
 * Parse one plugin dump. Hard fails on schema errors, including a form key
 * that appears twice inside the same plugin.
 */
export function parsePluginYaml(name: string, content: string): PluginContents {
  const raw: RawPluginYaml = yaml.parse(content) ?? {};

  const books = (raw.books ?? []).map((b) => toBook(b, name));
  const quests = (raw.quests ?? []).map((q) => toQuest(q, name));
  const other = (raw.other ?? []).map((o) => toOther(o, name));

  const seen = new Set<string>();
  for (const record of [...books, ...quests, ...other]) {
    const id = formKeyId(record.formKey);
    if (seen.has(id)) {
      throw new Error(`Duplicate form_key ${record.formKey} in ${name}`);
    }
    seen.add(id);
  }

  return { name, books, quests, other };
}

export function parsePluginsYaml(content: string): PluginEntry[] {
  const raw: RawPluginsYaml = yaml.parse(content) ?? {};
  const entries: PluginEntry[] = [];
  const names = new Set<string>();

  for (const entry of raw.plugins ?? []) {
    const name = entry.name?.trim();
    if (!name) throw new Error("plugins.yml entry missing name");
    if (names.has(name.toLowerCase())) throw new Error(`Duplicate plugin in load order: ${name}`);
    names.add(name.toLowerCase());
    entries.push({ name, enabled: entry.enabled ?? true });
  }

  return entries;
}

/**
 * Layered view over the enabled plugins. The last plugin in load order has the
 * highest priority; its copy of a record is the winning override. Records are
 * matched by `formKeyId` and keep the spelling of the plugin that first
 * defined them.
 */
export class LoadOrder implements RecordSource {
  private readonly winners = new Map<string, GameRecord>();
  private readonly priorityOrder: string[] = [];

  constructor(readonly plugins: readonly PluginContents[]) {
    const spelling = new Map<string, FormKey>();
    const canonical = <T extends { formKey: FormKey }>(record: T): [string, T] => {
      const id = formKeyId(record.formKey);
      const first = spelling.get(id);
      if (first === undefined) {
        spelling.set(id, record.formKey);
        return [id, record];
      }
      return [id, first === record.formKey ? record : { ...record, formKey: first }];
    };

    for (const plugin of plugins) {
      for (const book of plugin.books) {
        const [id, record] = canonical(book);
        this.winners.set(id, { type: "book", record });
      }
      for (const quest of plugin.quests) {
        const [id, record] = canonical(quest);
        this.winners.set(id, { type: "quest", record });
      }
      for (const other of plugin.other) {
        const [id, record] = canonical(other);
        this.winners.set(id, { type: "other", record });
      }
    }

    const seen = new Set<string>();
    for (let i = plugins.length - 1; i >= 0; i--) {
      const plugin = plugins[i];
      for (const record of [...plugin.books, ...plugin.quests, ...plugin.other]) {
        const id = formKeyId(record.formKey);
        if (seen.has(id)) continue;
        seen.add(id);
        this.priorityOrder.push(id);
      }
    }
  }

  get size(): number {
    return this.winners.size;
  }

  resolve(formKey: FormKey): GameRecord | undefined {
    return this.winners.get(formKeyId(formKey));
  }

  resolveBook(formKey: FormKey): BookRecord | undefined {
    const winner = this.resolve(formKey);
    if (winner && winner.type !== "book") {
      loadOrderLog.trace(`${formKey} resolves to a ${winner.type} record, not a book`);
    }
    return winner?.type === "book" ? winner.record : undefined;
  }

  *winningBooks(): Iterable<BookRecord> {
    for (const id of this.priorityOrder) {
      const winner = this.winners.get(id);
      if (winner?.type === "book") yield winner.record;
    }
  }

  *winningQuests(): Iterable<QuestRecord> {
    for (const id of this.priorityOrder) {
      const winner = this.winners.get(id);
      if (winner?.type === "quest") yield winner.record;
    }
  }
}

/**
 * Load the load order from a directory containing plugins.yml and
 * plugins/<name>.yml dumps. Disabled plugins are never read.
 */
export function loadLoadOrder(loadOrderDir: string): LoadOrder {
  const pluginsPath = path.join(loadOrderDir, "plugins.yml");
  if (!fs.existsSync(pluginsPath)) {
    throw new Error(`Load order not found: ${pluginsPath}`);
  }

  const entries = parsePluginsYaml(fs.readFileSync(pluginsPath, "utf-8"));
  const plugins: PluginContents[] = [];

  for (const entry of entries) {
    if (!entry.enabled) {
      loadOrderLog.debug(`Skipping disabled plugin ${entry.name}`);
      continue;
    }

    const pluginPath = path.join(loadOrderDir, "plugins", `${entry.name}.yml`);
    if (!fs.existsSync(pluginPath)) {
      throw new Error(`Plugin dump not found for ${entry.name}: ${pluginPath}`);
    }

    const plugin = parsePluginYaml(entry.name, fs.readFileSync(pluginPath, "utf-8"));
    loadOrderLog.debug(`Loaded ${entry.name}`, {
      books: plugin.books.length,
      quests: plugin.quests.length,
      other: plugin.other.length,
    });
    plugins.push(plugin);
  }

  const loadOrder = new LoadOrder(plugins);
  loadOrderLog.info(`Loaded ${plugins.length} enabled plugins, ${loadOrder.size} winning records`);
  return loadOrder;
}

/**
 * Create an empty load order directory if missing. Idempotent.
 */
export function ensureLoadOrderScaffold(loadOrderDir: string): void {
  fs.mkdirSync(path.join(loadOrderDir, "plugins"), { recursive: true });
  const pluginsPath = path.join(loadOrderDir, "plugins.yml");
  if (!fs.existsSync(pluginsPath)) {
    fs.writeFileSync(pluginsPath, "version: 1\n\nplugins:\n");
  }
}
