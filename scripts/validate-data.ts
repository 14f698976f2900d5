// ─── Validate Data ─────────────────────────────────────────────────
// CLI script that validates the bundled game data against the schemas.
// Exits 0 if every file passes, 1 if any fail.

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import type { z } from "zod";
import {
  formatIssues,
  safeParseBoard,
  safeParseCardCatalog,
  safeParseCharacterCatalog,
} from "../packages/schema/src/index.js";

const DATA_DIR = fileURLToPath(new URL("../packages/engine/data/", import.meta.url));

type Validator = (raw: unknown) => z.SafeParseReturnType<unknown, unknown>;

const FILES: ReadonlyArray<readonly [string, Validator]> = [
  ["characters.json", safeParseCharacterCatalog],
  ["cards.json", safeParseCardCatalog],
  ["board.json", safeParseBoard],
];

async function main(): Promise<void> {
  console.log(`\nValidating ${FILES.length} data file(s)...\n`);

  let failed = 0;

  for (const [file, validate] of FILES) {
    const raw = await readFile(join(DATA_DIR, file), "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.error(`  ❌ ${file}: invalid JSON`);
      if (err instanceof Error) {
        console.error(`     ${err.message}`);
      }
      failed++;
      continue;
    }

    const result = validate(parsed);

    if (result.success) {
      console.log(`  ✅ ${file}`);
    } else {
      console.error(`  ❌ ${file}`);
      for (const line of formatIssues(result.error)) {
        console.error(`     ${line}`);
      }
      failed++;
    }
  }

  console.log();

  if (failed > 0) {
    console.error(`${failed} of ${FILES.length} file(s) failed validation.`);
    process.exit(1);
  }

  console.log(`All ${FILES.length} file(s) passed validation.`);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
