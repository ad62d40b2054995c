import { unsupportedOption } from "./errors.js";
import type { EncapsulatingCharacters, LabelPosition, LabelSettings, TagSet } from "./types.js";

type ComposeSettings = Pick<LabelSettings, "labelFormat" | "labelPosition" | "encapsulatingCharacters">;

export const TAG_SEPARATOR = "/";

export function encapsulation(chars: EncapsulatingCharacters): [open: string, close: string] {
  switch (chars) {
    case "Angle":
      return ["<", ">"];
    case "Brace":
      return ["{", "}"];
    case "Paren":
      return ["(", ")"];
    case "Bracket":
      return ["[", "]"];
    case "Star":
      return ["*", "*"];
    default:
      return unsupportedOption("encapsulatingCharacters", chars);
  }
}

function starName(existingName: string, position: LabelPosition): string {
  switch (position) {
    case "Before":
      return `*${existingName}`;
    case "After":
      return `${existingName}*`;
    default:
      return unsupportedOption("labelPosition", position);
  }
}

/**
 * Wrap an already-joined label and place it beside the name.
 */
export function getLabel(existingName: string, label: string, settings: Omit<ComposeSettings, "labelFormat">): string {
  const [open, close] = encapsulation(settings.encapsulatingCharacters);

  switch (settings.labelPosition) {
    case "Before":
      return `${open}${label}${close} ${existingName}`;
    case "After":
      return `${existingName} ${open}${label}${close}`;
    default:
      return unsupportedOption("labelPosition", settings.labelPosition);
  }
}

/**
 * New display name for a book. Star format ignores the tag contents and adds
 * a single "*"; the other formats join tags with "/" and wrap them.
 */
export function composeName(existingName: string, tags: TagSet, settings: ComposeSettings): string {
  switch (settings.labelFormat) {
    case "Star":
      return starName(existingName, settings.labelPosition);
    case "Long":
    case "Short":
      return getLabel(existingName, tags.join(TAG_SEPARATOR), settings);
    default:
      return unsupportedOption("labelFormat", settings.labelFormat);
  }
}
