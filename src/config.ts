import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import stripJsonComments from "strip-json-comments";
import { z } from "zod";
import { type MeldConfig, OUTPUT_FORMATS } from "./types";

const CONFIG_FILES = [
  "makemeld.jsonc",
  "makemeld.json",
  "makemeld.toml",
] as const;

const MeldConfigSchema = z
  .object({
    output: z.enum(OUTPUT_FORMATS).optional(),
    context: z
      .number()
      .int("context must be an integer")
      .nonnegative("context must not be negative")
      .optional(),
    runner: z
      .string()
      .min(1, "runner must not be empty")
      .refine(
        (s) => s.includes("{prompt}"),
        "runner must contain {prompt} placeholder"
      )
      .optional(),
  })
  .passthrough();

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function discoverConfig(cwd?: string): Promise<string | null> {
  const dir = cwd ?? process.cwd();

  for (const filename of CONFIG_FILES) {
    const filepath = resolve(dir, filename);
    if (await fileExists(filepath)) {
      return filepath;
    }
  }

  return null;
}

export async function loadConfig(path: string): Promise<MeldConfig> {
  const ext = path.split(".").pop()?.toLowerCase();
  const text = await readFile(path, "utf-8");

  if (ext === "json" || ext === "jsonc") {
    return validateConfig(JSON.parse(stripJsonComments(text)));
  }

  if (ext === "toml") {
    return validateConfig(parseToml(text));
  }

  throw new Error(`makemeld: unsupported config format: ${ext}`);
}

export function validateConfig(raw: unknown): MeldConfig {
  const result = MeldConfigSchema.safeParse(raw);

  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? ` in "${issue.path.join(".")}"` : "";
    throw new Error(`makemeld: config error${path}: ${issue.message}`);
  }

  const { output, context, runner } = result.data;
  return { output, context, runner };
}
