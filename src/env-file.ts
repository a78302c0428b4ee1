import fs from "node:fs";
import { randomBytes } from "node:crypto";
import { parse } from "dotenv";
import type { ProvisionContext } from "./context";

export interface EnvSecrets {
  jwtSecret: string;
  encryptionKey: string;
}

export function generateSecrets(): EnvSecrets {
  return {
    jwtSecret: randomBytes(32).toString("hex"),
    encryptionKey: randomBytes(16).toString("hex"),
  };
}

export function renderEnvFile(
  secrets: EnvSecrets,
  vars: { domain: string; email: string; bindHost: string }
): string {
  return [
    `JWT_SECRET=${secrets.jwtSecret}`,
    `ENCRYPTION_KEY=${secrets.encryptionKey}`,
    `DOMAIN=${vars.domain}`,
    `CERTBOT_EMAIL=${vars.email}`,
    `BIND_HOST=${vars.bindHost}`,
    "",
  ].join("\n");
}

/**
 * Writes `.env` once. An existing file is never touched, so sessions signed
 * with its secrets stay valid across re-runs.
 *
 * @returns true when a new file was written
 */
export function writeEnvFile(ctx: ProvisionContext): boolean {
  const { paths, settings, config, logger } = ctx;

  if (fs.existsSync(paths.envFile)) {
    logger.warn(".env already exists, keeping existing secrets");
    const existing = parse(fs.readFileSync(paths.envFile));
    if (existing.DOMAIN && existing.DOMAIN !== settings.domain) {
      logger.warn(
        `.env was generated for ${existing.DOMAIN}, not ${settings.domain}; remove it to regenerate`
      );
    }
    return false;
  }

  const content = renderEnvFile(generateSecrets(), {
    domain: settings.domain,
    email: settings.email,
    bindHost: config.bindHost,
  });
  fs.writeFileSync(paths.envFile, content, { mode: 0o600 });
  return true;
}
