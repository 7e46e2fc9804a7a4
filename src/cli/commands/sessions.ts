import type { Command } from "commander";
import { existsSync } from "fs";
import { join } from "path";
import { KeywordRepository } from "../../db/repositories/keyword.repo";
import { DATABASE_FILENAME, keywordDir } from "../../db/client";
import { env } from "../../core/config";

interface SessionsCommandOptions {
  output: string;
  limit: string;
}

function formatTime(epochSeconds: number | null): string {
  return epochSeconds === null ? "-" : new Date(epochSeconds * 1000).toISOString();
}

export const commands = (program: Command) => {
  program
    .command("sessions:list <keyword>")
    .description("Show recent sessions and download task counts for a keyword")
    .option("-o, --output <dir>", "Output directory", env.OUTPUT_DIR)
    .option("--limit <n>", "Number of sessions to show", "20")
    .action(async (keyword: string, options: SessionsCommandOptions) => {
      if (!existsSync(join(keywordDir(options.output, keyword), DATABASE_FILENAME))) {
        console.log(`No database for "${keyword}" under ${options.output}`);
        process.exit(1);
      }

      const repo = KeywordRepository.open(options.output, keyword);
      try {
        const sessions = await repo.listSessions(parseInt(options.limit, 10));
        console.log(`Sessions (${sessions.length})`);
        for (const s of sessions) {
          console.log(`  [${s.id}] ${s.keyword} - ${s.status} - ${s.savedCount}/${s.targetCount}`);
          console.log(`      Started: ${formatTime(s.startedAt)} | Completed: ${formatTime(s.completedAt)}`);
        }

        const tasks = await repo.countTasksByStatus();
        console.log("");
        console.log(
          `Download tasks: ${tasks.pending} pending, ${tasks.downloading} downloading, ${tasks.completed} completed, ${tasks.failed} failed`
        );
      } finally {
        repo.close();
      }
    });
};
