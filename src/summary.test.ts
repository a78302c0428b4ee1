import fs from "node:fs";
import { afterEach, describe, expect, it } from "vitest";
import { printSummary, readAdminCredentials } from "./summary";
import { createTestContext } from "./test-utils";

const dirs: string[] = [];

afterEach(() => {
  for (const d of dirs.splice(0)) fs.rmSync(d, { recursive: true, force: true });
});

describe("readAdminCredentials", () => {
  it("returns null before the app has written init.json", () => {
    expect(readAdminCredentials("/nonexistent/data/init.json")).toBeNull();
  });
});

describe("printSummary", () => {
  it("shows the admin credentials once the app has written them", () => {
    const { ctx, logger, deployDir } = createTestContext();
    dirs.push(deployDir);
    fs.mkdirSync(`${deployDir}/data`);
    fs.writeFileSync(ctx.paths.initJson, '{"adminUsername":"admin"}\n');

    printSummary(ctx);

    expect(logger.entries).toContainEqual({
      level: "note",
      message: 'Admin credentials: {"adminUsername":"admin"}',
    });
  });

  it("tells the operator where to find credentials otherwise", () => {
    const { ctx, logger, deployDir } = createTestContext();
    dirs.push(deployDir);

    printSummary(ctx);

    expect(logger.entries).toContainEqual({
      level: "note",
      message: "Admin credentials: (shown on first visit)",
    });
  });
});
