#!/usr/bin/env node
// src/cli/cli.ts

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfigFromEnv, parseConfig } from "../config";
import { BitValueError, InvalidArgumentError } from "../errors";
import { ConsoleLogger, type Logger } from "../utils/logger";
import { buildReport, parseOperands } from "./report";

export interface CliIO {
  out: (line: string) => void;
  logger: Logger;
  readInput: () => Promise<string>;
  env: NodeJS.ProcessEnv;
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  logger: new ConsoleLogger(),
  readInput: readStdin,
  env: process.env,
};

const options = {
  overflow: {
    describe: "Overflow policy for native conversion: wrap | throw",
    type: "string",
  },
  multiply: {
    describe: "Multiplication strategy: native | bit-serial",
    type: "string",
  },
  decimal: {
    alias: ["d"],
    describe: "Append the native integer value to each line",
    type: "boolean",
    default: false,
  },
  quiet: {
    alias: ["q"],
    describe: "Suppress the status line",
    type: "boolean",
    default: false,
  },
  help: {
    alias: ["h"],
    describe: "Show help",
    type: "boolean",
    default: false,
  },
} as const;

/**
 * Prints a, b, Sum, Difference, Product, AND, OR and XOR for two unsigned
 * integers given as arguments or, failing that, on standard input.
 * Resolves to the process exit code.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const started = Date.now();
  try {
    // Help is printed through io; yargs never exits the process.
    const parser = yargs(argv)
      .scriptName("bit-uint")
      .usage("$0 [a] [b]")
      .options(options)
      .parserConfiguration({ "parse-positional-numbers": false })
      .version(false)
      .help(false)
      .exitProcess(false)
      .strictOptions()
      .fail((msg, err) => {
        throw err ?? new InvalidArgumentError(msg);
      });
    const args = await parser.parseAsync();

    if (args.help) {
      io.out(await parser.getHelp());
      return 0;
    }

    const config = parseConfig(
      { overflow: args.overflow, multiply: args.multiply },
      loadConfigFromEnv(io.env)
    );
    const tokens = args._.length > 0 ? args._.map(String) : [await io.readInput()];
    const [a, b] = parseOperands(tokens);

    for (const line of buildReport(a, b, { config, decimal: args.decimal })) {
      io.out(line);
    }
    if (!args.quiet) {
      io.logger.status(`Done in ${Date.now() - started}ms`);
    }
    return 0;
  } catch (err) {
    if (err instanceof BitValueError) {
      io.logger.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

if (require.main === module) {
  main(hideBin(process.argv)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
