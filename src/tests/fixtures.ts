import { DEFAULT_LABEL_SETTINGS } from "../labels/settings.js";
import type { LabelSettings } from "../labels/types.js";
import { LoadOrder } from "../loadOrder/loadLoadOrder.js";
import type { BookRecord, PluginContents } from "../loadOrder/types.js";

export function makeBook(formKey: string, overrides: Partial<Omit<BookRecord, "formKey">> = {}): BookRecord {
  return { formKey, scripts: [], ...overrides };
}

export function makeSettings(overrides: Partial<LabelSettings> = {}): LabelSettings {
  return { ...DEFAULT_LABEL_SETTINGS, ...overrides };
}

export function makePlugin(name: string, contents: Partial<Omit<PluginContents, "name">> = {}): PluginContents {
  return { name, books: [], quests: [], other: [], ...contents };
}

export function makeLoadOrder(...plugins: PluginContents[]): LoadOrder {
  return new LoadOrder(plugins);
}
