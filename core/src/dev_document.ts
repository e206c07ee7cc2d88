import { documentDirectory } from "./index";
import { resolveRunConfig } from "./config";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const directory = args.find((arg) => !arg.startsWith("--"));
  const dryRun = args.includes("--dry-run");
  const createChange = args.includes("--create-change");

  if (!directory) {
    console.error("Usage: dev_document <directory> [--dry-run] [--create-change]");
    process.exit(1);
  }

  const config = resolveRunConfig();
  console.log(`[document] start directory=${directory} dryRun=${dryRun}`);

  const report = await documentDirectory(directory, config, { dryRun, createChange });
  console.log(report.summary);
  for (const diagnostic of report.diagnostics) {
    console.warn(`[document] ${diagnostic.kind} ${diagnostic.path ?? diagnostic.language ?? ""}: ${diagnostic.message}`);
  }
  if (report.changeUrl) {
    console.log(`[document] change: ${report.changeUrl}`);
  }

  console.log("[document] done");
}

main().catch((error) => {
  console.error("[document] failed", error);
  process.exit(1);
});
