/**
 * Prints the resolved downmix matrix for a layout pair.
 *
 * Usage:
 *   npm run downmix:show -- --from LAYOUT.5_1 --to LAYOUT.2_0
 *   npm run downmix:show -- --from LAYOUT.7_1_4 --to LAYOUT.2_0 --format csv
 */

import "dotenv/config";
import { Command, Option } from "commander";
import { getConfig } from "../src/config/index.js";
import { DownmixResolver, formatMatrixCsv, loadCatalog, runValidation } from "../src/downmix/index.js";

async function main(): Promise<void> {
  const config = getConfig();

  const program = new Command()
    .name("downmix-show")
    .description("Resolve and print a downmix matrix")
    .requiredOption("--from <layout>", "Source layout ID")
    .requiredOption("--to <layout>", "Target layout ID")
    .option("--policy <id>", "Policy ID (default: the source layout's default policy)")
    .option("--registry <path>", "Registry file", config.downmix.registryPath)
    .option("--ontology <dir>", "Directory holding layouts.yaml and speakers.yaml", config.downmix.ontologyDir)
    .addOption(new Option("--format <format>", "Output format").choices(["json", "csv"]).default("json"))
    .parse(process.argv);

  const opts = program.opts<{
    from: string;
    to: string;
    policy?: string;
    registry: string;
    ontology: string;
    format: string;
  }>();

  const catalog = await loadCatalog(opts.ontology);
  const run = await runValidation(opts.registry, catalog);
  if (!run.report.ok) {
    console.error(
      `Registry has ${run.report.issue_counts.error} error(s); run downmix:validate for details.`
    );
    process.exit(1);
  }

  const resolver = DownmixResolver.fromRun(run);
  const matrix = resolver.resolveMatrix(opts.from, opts.to, opts.policy);

  if (opts.format === "csv") {
    process.stdout.write(formatMatrixCsv(matrix));
  } else {
    console.log(JSON.stringify(matrix, null, 2));
  }
}

main().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
