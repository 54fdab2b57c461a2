import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverConfig, loadConfig, validateConfig } from "../src/config";

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "makemeld-config-"));
});

afterEach(async () => {
  await rm(tempDir, { recursive: true });
});

async function writeConfig(filename: string, content: string): Promise<string> {
  const path = join(tempDir, filename);
  await writeFile(path, content);
  return path;
}

describe("validateConfig", () => {
  it("accepts an empty config", () => {
    expect(validateConfig({})).toEqual({
      output: undefined,
      context: undefined,
      runner: undefined,
    });
  });

  it("accepts every known setting", () => {
    expect(
      validateConfig({ output: "json", context: 5, runner: "llm {prompt}" })
    ).toEqual({ output: "json", context: 5, runner: "llm {prompt}" });
  });

  it("rejects an unknown output format", () => {
    expect(() => validateConfig({ output: "html" })).toThrow(
      /^makemeld: config error in "output": /
    );
  });

  it("rejects a negative context", () => {
    expect(() => validateConfig({ context: -1 })).toThrow(
      'makemeld: config error in "context": context must not be negative'
    );
  });

  it("rejects a runner without a prompt placeholder", () => {
    expect(() => validateConfig({ runner: "llm --print" })).toThrow(
      'makemeld: config error in "runner": runner must contain {prompt} placeholder'
    );
  });

  it("rejects a config that is not an object", () => {
    expect(() => validateConfig("json")).toThrow(/^makemeld: config error: /);
  });
});

describe("loadConfig", () => {
  it("reads JSONC with comments", async () => {
    const path = await writeConfig(
      "makemeld.jsonc",
      '{\n  // machine-readable by default\n  "output": "json"\n}\n'
    );

    expect((await loadConfig(path)).output).toBe("json");
  });

  it("reads TOML", async () => {
    const path = await writeConfig(
      "makemeld.toml",
      'output = "prompt"\ncontext = 1\nrunner = "llm {prompt}"\n'
    );

    expect(await loadConfig(path)).toEqual({
      output: "prompt",
      context: 1,
      runner: "llm {prompt}",
    });
  });

  it("rejects other file types", async () => {
    const path = await writeConfig("makemeld.yaml", "output: json\n");

    await expect(loadConfig(path)).rejects.toThrow(
      "makemeld: unsupported config format: yaml"
    );
  });
});

describe("discoverConfig", () => {
  it("returns null when no config exists", async () => {
    expect(await discoverConfig(tempDir)).toBeNull();
  });

  it("prefers makemeld.jsonc over makemeld.toml", async () => {
    await writeConfig("makemeld.toml", 'output = "diff"\n');
    const jsonc = await writeConfig("makemeld.jsonc", "{}");

    expect(await discoverConfig(tempDir)).toBe(jsonc);
  });
});
