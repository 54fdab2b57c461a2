import { spawn } from "node:child_process";
import { Shescape } from "shescape";

/**
 * Execute a runner template as a login shell command, with `{prompt}`
 * replaced by the shell-quoted prompt.
 * Uses -l -i flags to ensure user's PATH is loaded from .zshrc/.bashrc.
 */
export async function executeRunner(
  runnerTemplate: string,
  prompt: string
): Promise<{ exitCode: number }> {
  const shell = process.env.SHELL || "/bin/sh";
  const shescape = new Shescape({ shell });
  const command = runnerTemplate.replace("{prompt}", shescape.quote(prompt));

  return new Promise((resolve, reject) => {
    const proc = spawn(shell, ["-l", "-i", "-c", command], {
      cwd: process.cwd(),
      stdio: "inherit",
      env: {
        ...process.env,
        FORCE_COLOR: "1",
      },
    });

    proc.on("error", reject);
    proc.on("close", (code) => {
      resolve({ exitCode: code ?? 1 });
    });
  });
}
