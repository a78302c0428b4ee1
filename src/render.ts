import fs from "node:fs";
import path from "node:path";
import type { ProvisionContext } from "./context";
import {
  renderComposeFile,
  renderHttpConfig,
  renderHttpsConfig,
} from "./templates";

/** @returns true when the compose file was written, false when one was kept */
export function writeComposeFile({ config, paths, logger }: ProvisionContext) {
  if (fs.existsSync(paths.composePath)) {
    logger.warn(`${paths.composeFile} already exists, keeping it`);
    return false;
  }
  fs.writeFileSync(paths.composePath, renderComposeFile(config));
  return true;
}

function writeProxyConfig(paths: ProvisionContext["paths"], content: string) {
  fs.mkdirSync(path.dirname(paths.nginxConf), { recursive: true });
  fs.writeFileSync(paths.nginxConf, content);
}

export function writeHttpProxyConfig({ paths, settings }: ProvisionContext) {
  writeProxyConfig(paths, renderHttpConfig(settings.domain));
}

export function writeHttpsProxyConfig({ paths, settings }: ProvisionContext) {
  writeProxyConfig(paths, renderHttpsConfig(settings.domain));
}
