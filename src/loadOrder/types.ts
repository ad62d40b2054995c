/** Canonical record identity: six upper-case hex digits, a colon, the plugin file name. */
export type FormKey = string;

export type Skill =
  | "Alchemy"
  | "Alteration"
  | "Archery"
  | "Block"
  | "Conjuration"
  | "Destruction"
  | "Enchanting"
  | "HeavyArmor"
  | "Illusion"
  | "LightArmor"
  | "Lockpicking"
  | "OneHanded"
  | "Pickpocket"
  | "Restoration"
  | "Smithing"
  | "Sneak"
  | "Speech"
  | "TwoHanded";

// null is the invalid sentinel (-1 / "None" in the dumps)
export type SkillValue = Skill | (string & {}) | null;

export type BookTeaches =
  | { kind: "skill"; skill: SkillValue }
  | { kind: "spell"; spell: FormKey };

export type BookRecord = {
  formKey: FormKey;
  name?: string;
  teaches?: BookTeaches;
  scripts: string[];
};

export type QuestAlias = {
  reference?: FormKey;
  items?: FormKey[];
};

export type QuestRecord = {
  formKey: FormKey;
  name?: string;
  aliases: QuestAlias[];
};

export type OtherRecord = {
  formKey: FormKey;
  type: string;
  name?: string;
};

export type GameRecord =
  | { type: "book"; record: BookRecord }
  | { type: "quest"; record: QuestRecord }
  | { type: "other"; record: OtherRecord };

export type PluginEntry = {
  name: string;
  enabled: boolean;
};

export type PluginContents = {
  name: string;
  books: BookRecord[];
  quests: QuestRecord[];
  other: OtherRecord[];
};

/**
 * Read side of the layered record database.
 * Enumerations yield winning overrides in priority order.
 */
export interface RecordSource {
  winningBooks(): Iterable<BookRecord>;
  winningQuests(): Iterable<QuestRecord>;
  resolveBook(formKey: FormKey): BookRecord | undefined;
}

// YAML schema (snake_case, loosely typed until validated)
export type RawBook = {
  form_key?: string | number | null;
  name?: string | null;
  teaches?: { skill?: string | number | null; spell?: string } | null;
  scripts?: unknown;
};

export type RawQuest = {
  form_key?: string | number | null;
  name?: string | null;
  aliases?: Array<RawAlias | null> | null;
};

export type RawAlias = {
  reference?: string | number | null;
  items?: unknown;
};

export type RawOther = {
  form_key?: string | number | null;
  type?: string;
  name?: string | null;
};

export type RawPluginYaml = {
  version?: number;
  books?: Array<RawBook | null> | null;
  quests?: Array<RawQuest | null> | null;
  other?: Array<RawOther | null> | null;
};

export type RawPluginsYaml = {
  version?: number;
  plugins?: Array<{ name?: string; enabled?: boolean }> | null;
};
