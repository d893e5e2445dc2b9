#!/usr/bin/env node

import { envFiles } from "./env.js";
import { Command } from "commander";
import chalk from "chalk";
import { createLogger } from "../infra/logger.js";

const ROOT_DIR = process.cwd();

const log = createLogger("cli");
log.debug("Environment files: %s", envFiles.join(", ") || "(none)");

/**
 * Run a command action; start-up and pipeline errors end the process with a
 * non-zero exit code after the full message (every violation) is shown.
 */
async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    log.error({ err }, "Command failed");
    console.error(chalk.red(`\n  Error: ${err instanceof Error ? err.message : String(err)}\n`));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name("finsight")
  .description("Ask questions about financial statements; a crew of agents queries the data and writes the report")
  .version("1.0.0");

// === SERVE (default) ===
program
  .command("serve", { isDefault: true })
  .description("Load the data and start the web app (default)")
  .option("-p, --port <port>", "Port to listen on (overrides PORT)")
  .action((opts: { port?: string }) =>
    runAction(async () => {
      const { runBoot } = await import("../gateway/boot.js");
      const { createApp, startServer } = await import("../web/server.js");

      const env = opts.port ? { ...process.env, PORT: opts.port } : process.env;
      const ctx = await runBoot({ rootDir: ROOT_DIR, env });
      const server = await startServer(createApp({ crew: ctx.crew }), ctx.settings.port);

      const shutdown = (signal: string) => {
        log.info("Received %s, shutting down", signal);
        server.close(() => {
          ctx.close();
          process.exit(0);
        });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    })
  );

// === INGEST ===
program
  .command("ingest")
  .description("Load the CSV into the SQLite database and exit")
  .option("--replace", "Rebuild the table even if it already exists")
  .action((opts: { replace?: boolean }) =>
    runAction(async () => {
      const { loadSettings } = await import("../config/config.js");
      const { loadCsvIntoStore } = await import("../data/loader.js");

      const settings = loadSettings(process.env, ROOT_DIR);
      const result = await loadCsvIntoStore({
        csvPath: settings.csvPath,
        dbPath: settings.dbPath,
        tableName: settings.tableName,
        replace: opts.replace ?? false,
      });

      if (result.skipped) {
        console.log(
          chalk.yellow(`\n  Table ${result.tableName} already exists (${result.rowCount} rows). Use --replace to rebuild it.\n`)
        );
        return;
      }
      console.log(chalk.green(`\n  Loaded ${result.rowCount} rows into ${result.tableName}`));
      console.log(chalk.dim(`  Columns: ${result.columns.map((c) => `${c.name} ${c.affinity}`).join(", ")}\n`));
    })
  );

// === ASK ===
program
  .command("ask")
  .description("Run the analysis once and print the markdown report")
  .argument("<question...>", "The question to answer")
  .action((words: string[]) =>
    runAction(async () => {
      const { runBoot } = await import("../gateway/boot.js");

      const query = words.join(" ").trim();
      if (!query) throw new Error("Please enter a question.");

      const ctx = await runBoot({ rootDir: ROOT_DIR });
      try {
        const result = await ctx.crew.kickoff({ query });
        console.log(`\n${result.report}\n`);
        console.log(
          chalk.dim(
            `  run ${result.runId} · ${result.usage.inputTokens + result.usage.outputTokens} tokens · ${(result.durationMs / 1000).toFixed(1)}s\n`
          )
        );
      } finally {
        ctx.close();
      }
    })
  );

await program.parseAsync(process.argv);
