import type { Command } from "commander";
import { mergeOutputTrees } from "../../orchestration/merge-service";

interface MergeCommandOptions {
  source: string;
  target: string;
  dryRun?: boolean;
  only?: string[];
}

export const commands = (program: Command) => {
  program
    .command("merge")
    .description("Copy pins and images missing from the target output directory")
    .requiredOption("--source <dir>", "Output directory to read from")
    .requiredOption("--target <dir>", "Output directory to merge into")
    .option("--only <partitions...>", "Restrict to these keyword directories")
    .option("--dry-run", "Report what would be merged without writing")
    .action(async (options: MergeCommandOptions) => {
      const results = await mergeOutputTrees({
        sourceDir: options.source,
        targetDir: options.target,
        dryRun: options.dryRun,
        only: options.only,
      });

      if (results.length === 0) {
        console.log(`No keyword databases under ${options.source}`);
        return;
      }

      const prefix = options.dryRun ? "[dry run] " : "";
      for (const r of results) {
        console.log(
          `${prefix}${r.partition}: ${r.added} added, ${r.skipped} already present, ${r.imagesCopied} images copied (${r.sourcePins} in source)`
        );
      }
    });
};
