/**
 * Runs every policy-validation fixture in a directory.
 *
 * Usage:
 *   npm run downmix:fixtures                      # fixtures/policies
 *   npm run downmix:fixtures -- path/to/fixtures
 */

import "dotenv/config";
import { Command } from "commander";
import { getConfig } from "../src/config/index.js";
import { discoverFixtures, loadCatalog, loadFixture, runFixture } from "../src/downmix/index.js";

async function main(): Promise<void> {
  const config = getConfig();

  const program = new Command()
    .name("downmix-fixtures")
    .description("Run policy-validation fixtures against the validator")
    .argument("[dir]", "Fixture directory", config.downmix.fixturesDir)
    .option("--ontology <dir>", "Directory holding layouts.yaml and speakers.yaml", config.downmix.ontologyDir)
    .parse(process.argv);

  const opts = program.opts<{ ontology: string }>();
  const dir = program.args[0] ?? config.downmix.fixturesDir;

  const catalog = await loadCatalog(opts.ontology);
  const files = await discoverFixtures(dir);
  if (files.length === 0) {
    console.error(`No fixtures found in ${dir}`);
    process.exit(1);
  }

  let failed = 0;
  for (const file of files) {
    const fixture = await loadFixture(file);
    const result = await runFixture(fixture, catalog);
    if (result.passed) {
      console.log(`PASS  ${result.fixture_id}`);
      continue;
    }
    failed += 1;
    console.log(`FAIL  ${result.fixture_id}`);
    for (const failure of result.failures) {
      console.log(`      ${failure}`);
    }
  }

  console.log(`\n${files.length - failed}/${files.length} fixture(s) passed.`);
  process.exit(failed > 0 ? 1 : 0);
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
