import fs from "node:fs";
import path from "node:path";
import type { ProvisionContext } from "./context";
import { runOrThrow } from "./shell";

export function fetchRepository({
  config,
  paths,
  shell,
  logger,
}: ProvisionContext): void {
  fs.mkdirSync(paths.deployDir, { recursive: true });

  if (fs.existsSync(path.join(paths.deployDir, ".git"))) {
    logger.warn("Repository already present, running git pull");
    runOrThrow(shell, "git", ["pull"], { cwd: paths.deployDir });
  } else {
    runOrThrow(shell, "git", ["clone", config.repoUrl, "."], {
      cwd: paths.deployDir,
    });
  }

  for (const dir of paths.scaffoldDirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
