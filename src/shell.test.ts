import { describe, expect, it } from "vitest";
import { CommandError } from "./errors";
import { commandExists, getCmdVersion, runOrThrow } from "./shell";
import { createFakeShell } from "./test-utils";

describe("runOrThrow", () => {
  it("passes the working directory through", () => {
    const shell = createFakeShell();
    runOrThrow(shell, "git", ["pull"], { cwd: "/srv/relay" });
    expect(shell.runs).toEqual([{ command: "git", args: ["pull"], cwd: "/srv/relay" }]);
  });

  it("raises CommandError with the exit status", () => {
    const shell = createFakeShell({ exitCode: () => 2 });
    try {
      runOrThrow(shell, "ufw", ["--force", "enable"]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CommandError);
      if (!(err instanceof CommandError)) return;
      expect(err.status).toBe(2);
      expect(err.command).toBe("ufw --force enable");
    }
  });
});

describe("commandExists", () => {
  it("probes through the shell builtin", () => {
    const shell = createFakeShell({ output: () => "/usr/bin/docker" });
    expect(commandExists(shell, "docker")).toBe(true);
    expect(shell.captures).toEqual([
      { command: "sh", args: ["-c", "command -v docker"], cwd: undefined },
    ]);
  });
});

describe("getCmdVersion", () => {
  it("tries the next flag when one fails", () => {
    const shell = createFakeShell({
      output: (c) => (c.args[0] === "version" ? "Docker version 24.0.7, build afdd53b" : null),
    });
    expect(getCmdVersion(shell, "docker")).toBe("24.0.7");
    expect(shell.captures.map((c) => c.args[0])).toEqual(["--version", "-v", "version"]);
  });

  it("returns null when nothing answers", () => {
    expect(getCmdVersion(createFakeShell(), "missing-tool")).toBeNull();
  });
});
