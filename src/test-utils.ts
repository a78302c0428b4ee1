import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { makePaths } from "./config";
import type { ProvisionContext } from "./context";
import type { NetworkProbe } from "./dns";
import type { Logger } from "./logger";
import type { RunOptions, ShellRunner } from "./shell";

export interface ShellCall {
  command: string;
  args: string[];
  cwd?: string;
}

export interface FakeShell extends ShellRunner {
  runs: ShellCall[];
  captures: ShellCall[];
  /** Each `run` call as a single command line. */
  lines(): string[];
}

export function createFakeShell(
  opts: {
    exitCode?: (call: ShellCall) => number;
    output?: (call: ShellCall) => string | null;
  } = {}
): FakeShell {
  const runs: ShellCall[] = [];
  const captures: ShellCall[] = [];
  const toCall = (command: string, args: string[], o?: RunOptions) => ({
    command,
    args,
    cwd: o?.cwd,
  });

  return {
    runs,
    captures,
    run(command, args, o) {
      const call = toCall(command, args, o);
      runs.push(call);
      return opts.exitCode?.(call) ?? 0;
    },
    capture(command, args, o) {
      const call = toCall(command, args, o);
      captures.push(call);
      return opts.output ? opts.output(call) : null;
    },
    lines: () => runs.map((c) => [c.command, ...c.args].join(" ")),
  };
}

export type LogEntry = { level: keyof Logger; message: string };

export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const push = (level: keyof Logger) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    info: push("info"),
    success: push("success"),
    warn: push("warn"),
    error: push("error"),
    step: push("step"),
    message: push("message"),
    note: (body, title) =>
      entries.push({ level: "note", message: title ? `${title}: ${body}` : body }),
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "relay-provision-"));
}

export const TEST_IP = "203.0.113.10";

export function createTestContext(
  overrides: {
    deployDir?: string;
    shell?: FakeShell;
    network?: Partial<NetworkProbe>;
    onPause?: (message: string) => void | Promise<void>;
  } = {}
) {
  const deployDir = overrides.deployDir ?? makeTempDir();
  const shell = overrides.shell ?? createFakeShell();
  const logger = createMemoryLogger();
  const pauses: string[] = [];
  const sleeps: number[] = [];

  const ctx: ProvisionContext = {
    config: {
      domain: "relay.example.com",
      deployDir,
      repoUrl: "https://git.example.com/relay.git",
      appImage: "example/relay:test",
      bindHost: "127.0.0.1",
      warmupMs: 5000,
    },
    settings: { domain: "relay.example.com", email: "ops@example.com" },
    paths: makePaths(deployDir),
    shell,
    logger,
    prompter: {
      async pause(message) {
        pauses.push(message);
        await overrides.onPause?.(message);
      },
    },
    network: {
      publicIp: async () => TEST_IP,
      resolveA: async () => TEST_IP,
      ...overrides.network,
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  };

  return { ctx, shell, logger, pauses, sleeps, deployDir };
}
