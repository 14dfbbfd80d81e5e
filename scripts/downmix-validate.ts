/**
 * Downmix registry validator CLI.
 *
 * Usage:
 *   npm run downmix:validate                                # validate the shipped registry
 *   npm run downmix:validate -- path/to/downmix.yaml        # validate a specific registry
 *   npm run downmix:validate -- --json                      # print the report as JSON
 *
 * Exit codes: 0 = clean, 1 = errors, 2 = warnings only.
 */

import "dotenv/config";
import { Command } from "commander";
import { getConfig } from "../src/config/index.js";
import { exitCodeFor, loadCatalog, validateRegistry, type Catalog } from "../src/downmix/index.js";

async function main(): Promise<void> {
  const config = getConfig();

  const program = new Command()
    .name("downmix-validate")
    .description("Validate a downmix policy registry and the packs it references")
    .argument("[registry]", "Path to the registry file", config.downmix.registryPath)
    .option("--ontology <dir>", "Directory holding layouts.yaml and speakers.yaml", config.downmix.ontologyDir)
    .option("--json", "Print the full report as JSON", false)
    .option("--sequential", "Load policy packs one at a time", false)
    .parse(process.argv);

  const opts = program.opts<{ ontology: string; json: boolean; sequential: boolean }>();
  const registry = program.args[0] ?? config.downmix.registryPath;

  let catalog: Catalog;
  try {
    catalog = await loadCatalog(opts.ontology);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const report = await validateRegistry(registry, catalog, opts.sequential ? { parallel: false } : {});

  if (opts.json) {
    console.log(JSON.stringify(report, null, 2));
    process.exit(exitCodeFor(report));
  }

  for (const issue of report.issues) {
    const label = issue.severity === "error" ? "ERROR" : "WARN ";
    const where = issue.evidence.matrix_id ?? issue.evidence.field ?? issue.evidence.file;
    const line = `${label}  ${issue.rule_id} [${where}] ${issue.message}`;
    if (issue.severity === "error") {
      console.error(line);
    } else {
      console.warn(line);
    }
  }

  if (report.issues.length === 0) {
    console.log(`Registry is valid — no issues found: ${report.registry_file}`);
  } else {
    console.log(`\n${report.issue_counts.error} error(s), ${report.issue_counts.warn} warning(s).`);
  }

  process.exit(exitCodeFor(report));
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
