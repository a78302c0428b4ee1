import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors";
import type { DeployPaths, ProvisionConfig } from "./types";

export const DEFAULT_REPO_URL =
  "https://github.com/Wei-Shaw/claude-relay-service.git";
export const DEFAULT_APP_IMAGE = "weishaw/claude-relay-service:latest";
export const DEFAULT_BIND_HOST = "127.0.0.1";
export const DEFAULT_WARMUP_SECONDS = 5;
export const COMPOSE_FILE = "docker-compose.prod.yml";
// setTimeout clamps anything above a signed 32-bit delay to 1 ms
const MAX_TIMER_MS = 2 ** 31 - 1;

export function normalizeDomain(input: string | null | undefined) {
  if (!input) return null;
  let t = input.trim().toLowerCase();
  // strip scheme, trailing slashes
  t = t.replace(/^\s*https?:\/\//, "").replace(/\/+$/, "");
  return t || null;
}

export function domainLooksValid(val: string) {
  // labels start/end with alphanumeric, may contain hyphens
  const re = /^(?!-)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i;
  return re.test(val);
}

function parseWarmup(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_WARMUP_SECONDS * 1000;
  }
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(
      `RELAY_WARMUP_SECONDS must be a non-negative number, got "${raw}"`
    );
  }
  if (seconds * 1000 > MAX_TIMER_MS) {
    throw new ConfigError(
      `RELAY_WARMUP_SECONDS must be at most ${Math.floor(MAX_TIMER_MS / 1000)} seconds, got "${raw}"`
    );
  }
  return seconds * 1000;
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): ProvisionConfig {
  const domain = normalizeDomain(env.RELAY_DOMAIN);
  if (domain && !domainLooksValid(domain)) {
    throw new ConfigError(`RELAY_DOMAIN is not a valid domain: "${domain}"`);
  }

  return {
    domain,
    deployDir: path.resolve(
      env.RELAY_DEPLOY_DIR || path.join(os.homedir(), "claude-relay-service")
    ),
    repoUrl: env.RELAY_REPO_URL || DEFAULT_REPO_URL,
    appImage: env.RELAY_APP_IMAGE || DEFAULT_APP_IMAGE,
    bindHost: env.RELAY_BIND_HOST || DEFAULT_BIND_HOST,
    warmupMs: parseWarmup(env.RELAY_WARMUP_SECONDS),
  };
}

export function makePaths(deployDir: string): DeployPaths {
  return {
    deployDir,
    envFile: path.join(deployDir, ".env"),
    composeFile: COMPOSE_FILE,
    composePath: path.join(deployDir, COMPOSE_FILE),
    nginxConf: path.join(deployDir, "nginx", "conf.d", "default.conf"),
    initJson: path.join(deployDir, "data", "init.json"),
    scaffoldDirs: [
      "logs",
      "data",
      "redis_data",
      path.join("certbot", "conf"),
      path.join("certbot", "www"),
      path.join("nginx", "conf.d"),
    ].map((d) => path.join(deployDir, d)),
  };
}
