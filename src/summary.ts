import fs from "node:fs";
import pc from "picocolors";
import type { ProvisionContext } from "./context";

export function readAdminCredentials(initJson: string): string | null {
  if (!fs.existsSync(initJson)) return null;
  const raw = fs.readFileSync(initJson, "utf8").trim();
  return raw || null;
}

export function formatCommands(deployDir: string, composeFile: string) {
  const dc = `docker compose -f ${composeFile}`;
  return [
    `cd ${deployDir}`,
    `${dc} logs -f     ${pc.dim("# follow logs")}`,
    `${dc} restart     ${pc.dim("# restart services")}`,
    `${dc} down        ${pc.dim("# stop services")}`,
    `${dc} pull && ${dc} up -d  ${pc.dim("# update")}`,
  ].join("\n");
}

export function printSummary({ settings, paths, logger }: ProvisionContext) {
  logger.success(`Deployment complete: ${pc.bold(`https://${settings.domain}`)}`);

  logger.note(
    readAdminCredentials(paths.initJson) ?? "(shown on first visit)",
    "Admin credentials"
  );
  logger.note(formatCommands(paths.deployDir, paths.composeFile), "Common commands");
  logger.note(
    [
      "1. Turn the proxy on (orange cloud)",
      "2. Set SSL/TLS mode to Full (strict)",
    ].join("\n"),
    "Cloudflare (optional)"
  );
}
