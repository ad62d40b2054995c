import fs from "node:fs";
import path from "node:path";
import { getConfig, printConfigSnapshot } from "../config/env.js";
import { resolveRunPaths } from "../dataPaths.js";
import { ConfigurationError } from "../labels/errors.js";
import { ensureLabelSettingsFile, loadLabelSettings } from "../labels/settings.js";
import { ensureLoadOrderScaffold, loadLoadOrder } from "../loadOrder/loadLoadOrder.js";
import { exportPatchYaml, openPatchStore } from "../patch/patchStore.js";
import { runPatch } from "../patch/runPatch.js";
import { boolArg, parseArgs, stringArg } from "./args.js";
import { log } from "../utils/logger.js";

/**
 * Book label patcher.
 *
 * Reads the load order dumps, tags every winning book and writes the
 * renamed books to the patch database.
 *
 * Usage:
 *   npx tsx src/tools/run-patch.ts
 *   npx tsx src/tools/run-patch.ts --loadOrder ./data/loadOrder --settings ./data/settings.yml
 *   npx tsx src/tools/run-patch.ts --db ./out/patch.sqlite --yamlOut ./out/patch.yml
 *   npx tsx src/tools/run-patch.ts --dryRun --printConfig
 *   npx tsx src/tools/run-patch.ts --init   # scaffold data dir and default settings
 */

const bootLog = log.withScope("boot");

function main(): void {
  const args = parseArgs(process.argv.slice(2));
  const cfg = getConfig();
  if (boolArg(args, "printConfig")) printConfigSnapshot(cfg);

  const paths = resolveRunPaths({
    loadOrderDir: stringArg(args, "loadOrder"),
    settingsPath: stringArg(args, "settings"),
    patchDbPath: stringArg(args, "db"),
  }, cfg);
  const pluginName = stringArg(args, "plugin") ?? cfg.patch.pluginName;
  const dryRun = boolArg(args, "dryRun");
  const yamlOut = stringArg(args, "yamlOut");

  if (boolArg(args, "init")) {
    ensureLoadOrderScaffold(paths.loadOrderDir);
    ensureLabelSettingsFile(paths.settingsPath);
    bootLog.info(`Scaffolded ${paths.loadOrderDir} and ${paths.settingsPath}`);
    return;
  }

  const settings = loadLabelSettings(paths.settingsPath);
  const loadOrder = loadLoadOrder(paths.loadOrderDir);

  if (dryRun) {
    const result = runPatch({ source: loadOrder, settings });
    bootLog.info(`Dry run: ${result.instructions.length} of ${result.booksSeen} books would be relabeled`);
    return;
  }

  const store = openPatchStore(paths.patchDbPath, { pluginName });
  try {
    const result = store.runInTransaction(() => runPatch({ source: loadOrder, settings, writer: store }));
    bootLog.info(`Relabeled ${result.instructions.length} of ${result.booksSeen} books into ${pluginName}`, {
      unnamed: result.booksUnnamed,
      questBooks: result.questBookCount,
      db: paths.patchDbPath,
    });

    if (yamlOut) {
      const outPath = path.resolve(yamlOut);
      fs.mkdirSync(path.dirname(outPath), { recursive: true });
      fs.writeFileSync(outPath, exportPatchYaml(store));
      bootLog.info(`Patch exported to ${outPath}`);
    }
  } finally {
    store.close();
  }
}

try {
  main();
} catch (err) {
  const kind = err instanceof ConfigurationError ? "CONFIGURATION ERROR" : "ERROR";
  console.error(`[run-patch] ${kind}:`, err instanceof Error ? err.message : err);
  process.exit(1);
}
