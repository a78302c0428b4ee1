import { execFileSync, spawnSync } from "node:child_process";
import { CommandError } from "./errors";

export interface RunOptions {
  cwd?: string;
}

export interface ShellRunner {
  /** Streams output to the terminal and returns the exit status. */
  run(command: string, args: string[], options?: RunOptions): number;
  /** Trimmed stdout, or null when the command fails or is missing. */
  capture(command: string, args: string[], options?: RunOptions): string | null;
}

export function makeShellRunner(): ShellRunner {
  return {
    run(command, args, options = {}) {
      const res = spawnSync(command, args, {
        cwd: options.cwd,
        stdio: "inherit",
      });
      if (res.error) return 127;
      return res.status ?? 1;
    },
    capture(command, args, options = {}) {
      try {
        return execFileSync(command, args, {
          cwd: options.cwd,
          stdio: ["ignore", "pipe", "ignore"],
        })
          .toString()
          .trim();
      } catch {
        return null;
      }
    },
  };
}

export function runOrThrow(
  shell: ShellRunner,
  command: string,
  args: string[],
  options?: RunOptions
): void {
  const status = shell.run(command, args, options);
  if (status !== 0) throw new CommandError(command, args, status);
}

export function commandExists(shell: ShellRunner, name: string): boolean {
  return shell.capture("sh", ["-c", `command -v ${name}`]) !== null;
}

/** First version-looking token from `<cmd> --version` style output. */
export function getCmdVersion(
  shell: ShellRunner,
  cmd: string,
  args = ["--version"]
): string | null {
  for (const a of [args, ["-v"], ["version"]]) {
    const out = shell.capture(cmd, a);
    if (out === null) continue; // try next flag
    const m = out.match(/\d+(?:\.\d+){0,3}/);
    return m?.[0] ?? out;
  }
  return null;
}
