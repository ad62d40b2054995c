import { unsupportedOption } from "./errors.js";
import type { FixedLabel, LabelFormat } from "./types.js";
import type { BookRecord, Skill } from "../loadOrder/types.js";

const SKILL_LABELS: Record<Skill, FixedLabel> = {
  Alchemy: { Long: "Alchimie", Short: "Alch" },
  Alteration: { Long: "Altération", Short: "Altr" },
  Archery: { Long: "Archerie", Short: "Arch" },
  Block: { Long: "Parade", Short: "Pard" },
  Conjuration: { Long: "Conjuration", Short: "Conj" },
  Destruction: { Long: "Destruction", Short: "Dest" },
  Enchanting: { Long: "Enchantement", Short: "Ench" },
  HeavyArmor: { Long: "Armure lourde", Short: "Arm.L" },
  Illusion: { Long: "Illusion", Short: "Illu" },
  LightArmor: { Long: "Armure légère", Short: "Arm.l" },
  Lockpicking: { Long: "Crochetage", Short: "Croch" },
  OneHanded: { Long: "Une main", Short: "1M" },
  Pickpocket: { Long: "Vol à la tire", Short: "Vol" },
  Restoration: { Long: "Guérison", Short: "Guéri" },
  Smithing: { Long: "Forgeage", Short: "Forge" },
  Sneak: { Long: "Furtivité", Short: "Furti" },
  Speech: { Long: "Éloquence", Short: "Éloq" },
  TwoHanded: { Long: "Deux mains", Short: "2M" },
};

function isKnownSkill(value: string): value is Skill {
  return Object.hasOwn(SKILL_LABELS, value);
}

/**
 * Tag for the skill a book teaches, or undefined when it teaches none.
 * Unknown skill identifiers are passed through as-is.
 */
export function getSkillLabel(book: BookRecord, format: LabelFormat): string | undefined {
  if (book.teaches?.kind !== "skill") return undefined;
  const skill = book.teaches.skill;
  if (skill === null) return undefined;

  switch (format) {
    case "Long":
    case "Short":
      return isKnownSkill(skill) ? SKILL_LABELS[skill][format] : skill;
    case "Star":
      return "*";
    default:
      return unsupportedOption("labelFormat", format);
  }
}
