#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { discoverConfig, loadConfig } from "./config";
import { diffDocuments } from "./compare";
import { parseMakefile } from "./parser";
import { render, renderPrompt } from "./render";
import { executeRunner } from "./runner";
import {
  type MeldConfig,
  OUTPUT_FORMATS,
  type OutputFormat,
  type RenderOptions,
} from "./types";

const VERSION = "0.1.0";

const HELP = `makemeld ${VERSION}

Compare a source Makefile against a target Makefile.

Usage:
  makemeld <source> <target>             Show the analysis report
  makemeld -o, --output <format>         analysis | json | diff | prompt
  makemeld -U, --context <n>             Context lines for diff and prompt
  makemeld -r, --run                     Send the prompt to the configured runner
  makemeld -c, --config <path>           Use specific config file
  makemeld -h, --help                    Print this help
  makemeld -v, --version                 Print version
`;

const FormatSchema = z.enum(OUTPUT_FORMATS, {
  errorMap: () => ({
    message: `output must be one of: ${OUTPUT_FORMATS.join(", ")}`,
  }),
});

const ContextSchema = z.coerce
  .number({ invalid_type_error: "context must be a number" })
  .int("context must be an integer")
  .nonnegative("context must not be negative");

interface Args {
  help: boolean;
  version: boolean;
  run: boolean;
  output?: string;
  context?: string;
  configPath?: string;
  source?: string;
  target?: string;
}

function parseCliArgs(): Args {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
      run: { type: "boolean", short: "r", default: false },
      output: { type: "string", short: "o" },
      context: { type: "string", short: "U" },
      config: { type: "string", short: "c" },
    },
    allowPositionals: true,
    strict: true,
  });

  return {
    help: values.help ?? false,
    version: values.version ?? false,
    run: values.run ?? false,
    output: values.output,
    context: values.context,
    configPath: values.config,
    source: positionals[0],
    target: positionals[1],
  };
}

function fail(message: string, code = 1): never {
  console.error(`makemeld: ${message}`);
  process.exit(code);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function loadOptionalConfig(configPath?: string): Promise<MeldConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await discoverConfig();
  if (!resolvedPath) {
    return {};
  }

  try {
    return await loadConfig(resolvedPath);
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(1);
  }
}

async function readInput(role: string, path: string): Promise<string> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason =
      error instanceof Error && "code" in error && error.code === "ENOENT"
        ? "not found"
        : "unreadable";
    fail(`${role} file ${reason}: ${path}`);
  }

  if (text.trim().length === 0) {
    fail(`${role} file is empty: ${path}`);
  }
  return text;
}

function resolveFormat(args: Args, config: MeldConfig): OutputFormat {
  const result = FormatSchema.safeParse(args.output ?? config.output ?? "analysis");
  if (!result.success) {
    fail(result.error.issues[0].message);
  }
  return result.data;
}

function resolveContext(args: Args, config: MeldConfig): number | undefined {
  if (args.context === undefined) {
    return config.context;
  }
  const result = ContextSchema.safeParse(args.context);
  if (!result.success) {
    fail(result.error.issues[0].message);
  }
  return result.data;
}

function printResult(text: string): void {
  if (text.length === 0) {
    return;
  }
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}

async function runPrompt(
  runner: string,
  sourceText: string,
  targetText: string,
  options: RenderOptions
): Promise<number> {
  console.error(`makemeld: running: ${runner.replace("{prompt}", "...")}`);

  const prompt = renderPrompt(sourceText, targetText, options);
  const start = performance.now();
  const result = await executeRunner(runner, prompt);
  const elapsed = ((performance.now() - start) / 1000).toFixed(1);

  if (result.exitCode !== 0) {
    console.error(`makemeld: runner failed (exit ${result.exitCode}, ${elapsed}s)`);
    return 1;
  }

  console.error(`makemeld: done (${elapsed}s)`);
  return 0;
}

async function main(): Promise<void> {
  let args: Args;
  try {
    args = parseCliArgs();
  } catch (error) {
    fail(errorMessage(error));
  }

  if (args.help) {
    console.log(HELP);
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  if (!(args.source && args.target)) {
    fail("expected <source> and <target> Makefile paths (see --help)", 2);
  }

  const config = await loadOptionalConfig(args.configPath);
  const format = resolveFormat(args, config);
  const options: RenderOptions = {
    sourceLabel: args.source,
    targetLabel: args.target,
    context: resolveContext(args, config),
  };

  const sourceText = await readInput("source", args.source);
  const targetText = await readInput("target", args.target);

  if (args.run) {
    if (!config.runner) {
      fail("--run needs a runner in the config file");
    }
    process.exitCode = await runPrompt(config.runner, sourceText, targetText, options);
    return;
  }

  const result = diffDocuments(parseMakefile(sourceText), parseMakefile(targetText));
  printResult(render(result, sourceText, targetText, format, options));
}

main().catch((error) => {
  fail(errorMessage(error));
});
