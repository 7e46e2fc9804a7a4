import type { Command } from "commander";
import { KeywordRepository } from "../../db/repositories/keyword.repo";
import { env } from "../../core/config";

export const commands = (program: Command) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate <keyword>")
    .description("Create or upgrade the database for a keyword")
    .option("-o, --output <dir>", "Output directory", env.OUTPUT_DIR)
    .action(async (keyword: string, options: { output: string }) => {
      const repo = KeywordRepository.open(options.output, keyword);
      console.log(`Database ready at ${repo.handle.dbPath}`);
      repo.close();
    });
};
