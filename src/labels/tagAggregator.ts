import { getMapMarkerLabel } from "./mapMarkerLabel.js";
import { getQuestLabel } from "./questLabel.js";
import { getSkillLabel } from "./skillLabel.js";
import type { LabelSettings, TagSet } from "./types.js";
import type { QuestBookIndex } from "../quests/questBookIndex.js";
import type { BookRecord } from "../loadOrder/types.js";

export type CollectedTags = {
  tags: TagSet;
  questScripts: string[];
};

/**
 * Run the enabled resolvers for one book. Tag order is fixed:
 * skill, map marker, quest.
 */
export function collectTags(book: BookRecord, settings: LabelSettings, index: QuestBookIndex): CollectedTags {
  const tags: TagSet = [];
  let questScripts: string[] = [];

  if (settings.addSkillLabels) {
    const skillLabel = getSkillLabel(book, settings.labelFormat);
    if (skillLabel !== undefined) tags.push(skillLabel);
  }

  if (settings.addMapMarkerLabels) {
    const mapMarkerLabel = getMapMarkerLabel(book, settings.labelFormat);
    if (mapMarkerLabel !== undefined) tags.push(mapMarkerLabel);
  }

  if (settings.addQuestLabels) {
    const quest = getQuestLabel(book, index, settings);
    questScripts = quest.questScripts;
    if (quest.label !== undefined) tags.push(quest.label);
  }

  return { tags, questScripts };
}
