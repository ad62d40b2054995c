import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../../labels/errors.js";
import type { LabelFormat } from "../../labels/types.js";
import { findMapMarkerScript, getMapMarkerLabel } from "../../labels/mapMarkerLabel.js";
import { makeBook } from "../fixtures.js";

describe("getMapMarkerLabel", () => {
  test("matches MapMarker case-insensitively", () => {
    const book = makeBook("000810:Base.esm", { scripts: ["BookScript", "dlc1_mapmarkerRevealScript"] });
    expect(getMapMarkerLabel(book, "Long")).toBe("Marqueur carte");
    expect(getMapMarkerLabel(book, "Short")).toBe("Marqueur");
    expect(getMapMarkerLabel(book, "Star")).toBe("*");
  });

  test("returns undefined without scripts or without a match", () => {
    expect(getMapMarkerLabel(makeBook("000811:Base.esm"), "Long")).toBeUndefined();
    const book = makeBook("000812:Base.esm", { scripts: ["SkillBookScript"] });
    expect(getMapMarkerLabel(book, "Long")).toBeUndefined();
  });

  test("only the first matching script is considered", () => {
    expect(findMapMarkerScript(["A", "MapMarkerOne", "MAPMARKERTwo"])).toBe("MapMarkerOne");
  });
});

test("an unknown label format aborts with a configuration error", () => {
  const tiny: string = "Tiny";
  const book = makeBook("000813:Base.esm", { scripts: ["MapMarkerScript"] });
  expect(() => getMapMarkerLabel(book, tiny as LabelFormat)).toThrow(ConfigurationError);
});
