export const LABEL_FORMATS = ["Long", "Short", "Star"] as const;
export const LABEL_POSITIONS = ["Before", "After"] as const;
export const ENCAPSULATING_CHARACTERS = ["Angle", "Brace", "Paren", "Bracket", "Star"] as const;

export type LabelFormat = (typeof LABEL_FORMATS)[number];
export type LabelPosition = (typeof LABEL_POSITIONS)[number];
export type EncapsulatingCharacters = (typeof ENCAPSULATING_CHARACTERS)[number];

export type LabelSettings = {
  addSkillLabels: boolean;
  addMapMarkerLabels: boolean;
  addQuestLabels: boolean;
  assumeBookScriptsAreQuests: boolean;
  labelFormat: LabelFormat;
  labelPosition: LabelPosition;
  encapsulatingCharacters: EncapsulatingCharacters;
};

/** Tokens in skill, map-marker, quest order. At most three. */
export type TagSet = string[];

/** Per-format token table for labels that do not depend on the record. */
export type FixedLabel = Record<Exclude<LabelFormat, "Star">, string>;
