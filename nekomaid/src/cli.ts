#!/usr/bin/env node
/**
 * nekomaid CLI: inspect, check and hot-reload NekoMaid UI files.
 */

import { Command } from "commander";
import chalk from "chalk";
import { readFile } from "fs/promises";
import { resolve } from "path";
import { tokenize } from "./parser/index.js";
import { compile, loadDocument } from "./compile.js";
import { documentToJSON } from "./document/json.js";
import { DocumentStore } from "./reload/store.js";
import { loadStyleGuides } from "./config/index.js";
import { hasErrors } from "./types/diagnostic.js";
import { NekoMaidError } from "./types/errors.js";
import { diagnosticsToJSON, formatDiagnostics, formatEvent, formatToken, summarize } from "./cli/format.js";
import { errorMessage, prepareOptions } from "./cli/options.js";
import { watchFiles } from "./cli/watch.js";

interface ConfigOption {
  config?: string;
}

interface CheckOptions extends ConfigOption {
  recover?: boolean;
  format: string;
}

const program = new Command();

program.name("nekomaid").description("NekoMaid UI language tools").version("0.1.0");

function fail(err: unknown, origin: string): void {
  if (err instanceof NekoMaidError) {
    for (const line of formatDiagnostics([err.toDiagnostic()], origin)) {
      console.error(line);
    }
  } else {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
  }
  process.exitCode = 1;
}

// ── tokens ──

program
  .command("tokens")
  .description("Print the token stream of a file")
  .argument("<file>", "NekoMaid UI source file")
  .action(async (file: string) => {
    try {
      const source = await readFile(file, "utf-8");
      for (const token of tokenize(source)) {
        console.log(formatToken(token));
      }
    } catch (err) {
      fail(err, file);
    }
  });

// ── check ──

program
  .command("check")
  .description("Parse and resolve a file and report diagnostics")
  .argument("<file>", "NekoMaid UI source file")
  .option("--config <path>", "Config file (default: ./nekomaid.config.json)")
  .option("--recover", "Keep parsing after syntax errors to report more of them")
  .option("--format <format>", "Output format (text|json)", "text")
  .action(async (file: string, options: CheckOptions) => {
    try {
      if (options.format !== "text" && options.format !== "json") {
        throw new Error(`Invalid format: "${options.format}". Use text or json.`);
      }
      const prepared = await prepareOptions(options.config, options.recover);
      const source = await readFile(file, "utf-8");
      const result = compile(source, prepared.compile);

      if (options.format === "json") {
        console.log(JSON.stringify(diagnosticsToJSON(file, result.diagnostics), null, 2));
      } else {
        for (const line of formatDiagnostics(result.diagnostics, file)) {
          console.log(line);
        }
        const summary = summarize(result.diagnostics);
        console.log(result.ok ? chalk.green(`${file}: ok (${summary})`) : chalk.red(`${file}: ${summary}`));
      }
      process.exitCode = hasErrors(result.diagnostics) ? 1 : 0;
    } catch (err) {
      fail(err, file);
    }
  });

// ── print ──

program
  .command("print")
  .description("Print the resolved document as JSON")
  .argument("<file>", "NekoMaid UI source file")
  .option("--config <path>", "Config file (default: ./nekomaid.config.json)")
  .action(async (file: string, options: ConfigOption) => {
    try {
      const prepared = await prepareOptions(options.config);
      const source = await readFile(file, "utf-8");
      const document = loadDocument(source, prepared.compile);
      console.log(JSON.stringify(documentToJSON(document), null, 2));
    } catch (err) {
      fail(err, file);
    }
  });

// ── watch ──

program
  .command("watch")
  .description("Reload a file whenever it or one of its style guides changes")
  .argument("<file>", "NekoMaid UI source file")
  .option("--config <path>", "Config file (default: ./nekomaid.config.json)")
  .action(async (file: string, options: ConfigOption) => {
    try {
      const prepared = await prepareOptions(options.config);
      const { config } = prepared;
      const store = new DocumentStore({ ...prepared.compile, origin: file });
      store.events.subscribe((event) => console.log(formatEvent(event)));

      const reloadSource = async (): Promise<void> => {
        const source = await readFile(file, "utf-8");
        const result = store.reload(source);
        for (const line of formatDiagnostics(result.diagnostics, file)) {
          console.log(line);
        }
      };

      const reloadStyleGuides = async (): Promise<void> => {
        const guides = await loadStyleGuides(config.styleGuides, { widgets: config.widgets });
        const result = store.setStyleGuides(guides, file);
        if (result !== undefined) {
          for (const line of formatDiagnostics(result.diagnostics, file)) {
            console.log(line);
          }
        }
      };

      const debounced = (task: () => Promise<void>): (() => void) => {
        let timer: NodeJS.Timeout | undefined;
        return () => {
          if (timer !== undefined) clearTimeout(timer);
          timer = setTimeout(() => {
            task().catch((err: unknown) => console.error(chalk.red(`Error: ${errorMessage(err)}`)));
          }, config.debounceMs);
        };
      };

      await reloadSource();

      const sourcePath = resolve(file);
      const onSourceChange = debounced(reloadSource);
      const onGuideChange = debounced(reloadStyleGuides);
      const watcher = watchFiles([sourcePath, ...Object.values(config.styleGuides)], (changed) => {
        if (changed === sourcePath) onSourceChange();
        else onGuideChange();
      });
      console.log(chalk.dim(`Watching ${file}; press Ctrl+C to stop`));

      process.once("SIGINT", () => {
        watcher.close();
        store.close();
      });
    } catch (err) {
      fail(err, file);
    }
  });

await program.parseAsync();
