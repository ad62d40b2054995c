import { expect, test } from "vitest";
import { boolArg, parseArgs, stringArg } from "../../tools/args.js";

test("parseArgs reads values and bare flags", () => {
  const args = parseArgs(["--loadOrder", "./lo", "--dryRun", "--db", ":memory:", "stray"]);
  expect(args).toEqual({ loadOrder: "./lo", dryRun: true, db: ":memory:" });
});

test("stringArg and boolArg ignore mismatched types", () => {
  const args = parseArgs(["--settings", "  ", "--dryRun", "true", "--yamlOut"]);
  expect(stringArg(args, "settings")).toBeUndefined();
  expect(stringArg(args, "yamlOut")).toBeUndefined();
  expect(boolArg(args, "dryRun")).toBe(true);
  expect(boolArg(args, "missing")).toBe(false);
});
