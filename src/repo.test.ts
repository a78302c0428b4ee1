import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { fetchRepository } from "./repo";
import { createFakeShell, createTestContext, makeTempDir } from "./test-utils";

const dirs: string[] = [];

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe("fetchRepository", () => {
  it("clones into an empty deploy directory", () => {
    const root = makeTempDir();
    dirs.push(root);
    const { ctx, shell } = createTestContext({
      deployDir: path.join(root, "relay"),
    });

    fetchRepository(ctx);

    expect(shell.lines()).toEqual(["git clone https://git.example.com/relay.git ."]);
    expect(shell.runs[0].cwd).toBe(path.join(root, "relay"));
  });

  it("pulls when a checkout already exists", () => {
    const { ctx, shell, logger, deployDir } = createTestContext();
    dirs.push(deployDir);
    fs.mkdirSync(path.join(deployDir, ".git"));

    fetchRepository(ctx);

    expect(shell.lines()).toEqual(["git pull"]);
    expect(shell.runs[0].cwd).toBe(deployDir);
    expect(logger.entries).toEqual([
      { level: "warn", message: "Repository already present, running git pull" },
    ]);
  });

  it("creates the scaffold directories on every run", () => {
    const { ctx, deployDir } = createTestContext();
    dirs.push(deployDir);

    fetchRepository(ctx);
    fetchRepository(ctx);

    for (const d of [
      "logs",
      "data",
      "redis_data",
      "certbot/conf",
      "certbot/www",
      "nginx/conf.d",
    ]) {
      expect(fs.statSync(path.join(deployDir, d)).isDirectory()).toBe(true);
    }
  });

  it("stops when git fails", () => {
    const { ctx, deployDir } = createTestContext({
      shell: createFakeShell({ exitCode: () => 128 }),
    });
    dirs.push(deployDir);

    expect(() => fetchRepository(ctx)).toThrow(
      "Command failed with exit code 128: git clone https://git.example.com/relay.git ."
    );
    expect(fs.existsSync(path.join(deployDir, "logs"))).toBe(false);
  });
});
