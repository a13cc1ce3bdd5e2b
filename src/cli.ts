#!/usr/bin/env node
import { InvalidArgumentError as CommanderArgumentError, CommanderError, program } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import pc from "picocolors";
import { TABWRAP_CONFIG } from "./config.js";
import { LAYOUT_NAMES } from "./display/table-renderers.js";
import { TabwrapError } from "./errors.js";
import { readInput } from "./table/reader.js";
import { tabulate } from "./tabulate.js";
import { debug } from "./utils/debug.js";
import { parseUserWidths } from "./utils/user-widths.js";

// Get package version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));

interface CLIOptions {
  widths?: string;
  tableWidth?: number;
  layout: string;
  strict: boolean;
  delimiter: string;
  escape: boolean;
}

function parseTableWidth(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new CommanderArgumentError("TABLE_WIDTH must be a nonnegative integer.");
  }
  return parseInt(value, 10);
}

class TabwrapCLI {
  private warn(message: string): void {
    console.error(pc.yellow(`W: ${message}`));
  }

  private fail(message: string): number {
    console.error(pc.red(`E: ${message}`));
    return 1;
  }

  async run(filename: string | undefined, options: CLIOptions): Promise<number> {
    debug.log("[tabwrap] options", { filename, ...options });
    try {
      const widths = parseUserWidths(options.widths);
      const text = await readInput(filename);
      const rendered = tabulate(text, {
        widths,
        tableWidth: options.tableWidth,
        layout: options.layout,
        strict: options.strict,
        read: { separator: options.delimiter, backslashEscape: options.escape },
        warn: (message) => this.warn(message),
      });
      process.stdout.write(`${rendered}\n`);
      return 0;
    } catch (error) {
      if (error instanceof TabwrapError) {
        return this.fail(error.message);
      }
      throw error;
    }
  }
}

const cli = new TabwrapCLI();

program
  .name("tabwrap")
  .description(
    "Format plain text into fixed-width table with multi-line cells by wrapping text in each field",
  )
  .version(packageJson.version)
  .exitOverride()
  .configureOutput({
    writeOut: (str: string) => {
      process.stdout.write(str);
    },
    writeErr: (str: string) => {
      process.stderr.write(str);
    },
  })
  .argument("[FILENAME]", "The input stream, default to stdin")
  .option("-W, --widths <WIDTHS>", "The column widths, e.g. 4,*,8 where * is decided automatically")
  .option("-T, --table-width <TABLE_WIDTH>", "The table total width, default to terminal width", parseTableWidth)
  .option("-L, --layout <LAYOUT>", `The table layout, one of ${LAYOUT_NAMES.join(", ")}`, TABWRAP_CONFIG.DEFAULT_LAYOUT)
  .option("-S, --strict", "Fail instead of warning when a cell does not fit its column", false)
  .option("-d, --delimiter <DELIMITER>", "The field delimiter in the input data, default to <TAB>", TABWRAP_CONFIG.DEFAULT_SEPARATOR)
  .option("-e, --escape", "Enable escape sequences as `echo -e` in input data", false)
  .action(async (filename: string | undefined, options: CLIOptions) => {
    process.exitCode = await cli.run(filename, options);
  });

try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  // exitOverride turns --help and --version into exceptions too
  if (!(error instanceof CommanderError)) {
    throw error;
  }
  // Commander already wrote its message through writeErr
  process.exitCode = error.code === "commander.helpDisplayed" || error.code === "commander.version" ? 0 : 1;
}
