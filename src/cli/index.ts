#!/usr/bin/env node

import { Command } from "commander";
import { OUTPUT_FORMATS, type OutputFormat } from "../core/models.js";
import { CollectContext } from "../core/context.js";
import { SystemInfoCollector } from "../core/collector.js";
import { renderReport } from "../report/index.js";
import { consoleLogger, silentLogger } from "../utils/logger.js";
import { printBanner, VERSION } from "./banner.js";
import { createProgressCallbacks } from "./display.js";

interface CliOptions {
  format: string;
  banner: boolean;
  quiet?: boolean;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

const program = new Command();

program
  .name("host-snapshot")
  .description("Report the runtime, OS, CPU and memory of this machine for benchmark write-ups")
  .version(VERSION)
  .option("-f, --format <format>", "Output format: terminal, json, markdown", "terminal")
  .option("--no-banner", "Suppress the banner")
  .option("-q, --quiet", "Do not print diagnostics when a system query fails")
  .action((opts: CliOptions) => {
    if (!isOutputFormat(opts.format)) {
      console.error(`Unknown format: ${opts.format}`);
      console.error(`Available: ${OUTPUT_FORMATS.join(", ")}`);
      process.exit(1);
    }
    const format = opts.format;
    const isInteractive = format === "terminal" && process.stdout.isTTY === true;

    if (isInteractive && opts.banner) {
      printBanner();
    }

    const ctx = new CollectContext({
      logger: opts.quiet ? silentLogger : consoleLogger,
      callbacks: isInteractive ? createProgressCallbacks() : {},
    });

    const snapshot = new SystemInfoCollector().collect(ctx);
    const output = renderReport(snapshot, format);

    if (format === "terminal") {
      console.log(output);
    } else {
      // JSON/markdown go to stdout clean
      process.stdout.write(output + "\n");
    }
  });

program.parse();
