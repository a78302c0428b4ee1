import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_APP_IMAGE,
  DEFAULT_REPO_URL,
  domainLooksValid,
  loadConfig,
  makePaths,
  normalizeDomain,
} from "./config";

describe("normalizeDomain", () => {
  it("strips scheme, case and trailing slashes", () => {
    expect(normalizeDomain("  HTTPS://Relay.Example.com/// ")).toBe("relay.example.com");
  });

  it("treats blank input as absent", () => {
    expect(normalizeDomain("   ")).toBeNull();
    expect(normalizeDomain(undefined)).toBeNull();
  });
});

describe("domainLooksValid", () => {
  it.each(["relay.example.com", "example.org", "a-b.c.example.net"])("accepts %s", (d) => {
    expect(domainLooksValid(d)).toBe(true);
  });

  it.each(["localhost", "-bad.example.com", "relay_example.com", "10.0.0.1"])(
    "rejects %s",
    (d) => {
      expect(domainLooksValid(d)).toBe(false);
    }
  );
});

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({ HOME: "/home/ops" });
    expect(config).toMatchObject({
      domain: null,
      repoUrl: DEFAULT_REPO_URL,
      appImage: DEFAULT_APP_IMAGE,
      bindHost: "127.0.0.1",
      warmupMs: 5000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      RELAY_DOMAIN: "https://Relay.Example.com/",
      RELAY_DEPLOY_DIR: "/srv/relay",
      RELAY_REPO_URL: "https://git.example.com/fork.git",
      RELAY_APP_IMAGE: "example/relay:2",
      RELAY_BIND_HOST: "0.0.0.0",
      RELAY_WARMUP_SECONDS: "12",
    });
    expect(config).toEqual({
      domain: "relay.example.com",
      deployDir: "/srv/relay",
      repoUrl: "https://git.example.com/fork.git",
      appImage: "example/relay:2",
      bindHost: "0.0.0.0",
      warmupMs: 12000,
    });
  });

  it("rejects an invalid domain", () => {
    expect(() => loadConfig({ RELAY_DOMAIN: "not a domain" })).toThrow(
      'RELAY_DOMAIN is not a valid domain: "not a domain"'
    );
  });

  it("rejects a negative warmup", () => {
    expect(() => loadConfig({ RELAY_WARMUP_SECONDS: "-1" })).toThrow(
      'RELAY_WARMUP_SECONDS must be a non-negative number, got "-1"'
    );
  });

  it("rejects a warmup longer than a timer can wait", () => {
    expect(() => loadConfig({ RELAY_WARMUP_SECONDS: "2147484" })).toThrow(
      'RELAY_WARMUP_SECONDS must be at most 2147483 seconds, got "2147484"'
    );
    expect(loadConfig({ RELAY_WARMUP_SECONDS: "2147483" }).warmupMs).toBe(
      2147483000
    );
  });
});

describe("makePaths", () => {
  it("places every artifact under the deploy directory", () => {
    const paths = makePaths("/srv/relay");
    expect(paths.envFile).toBe("/srv/relay/.env");
    expect(paths.composePath).toBe("/srv/relay/docker-compose.prod.yml");
    expect(paths.nginxConf).toBe("/srv/relay/nginx/conf.d/default.conf");
    expect(paths.initJson).toBe("/srv/relay/data/init.json");
    expect(paths.scaffoldDirs.map((d) => path.relative("/srv/relay", d))).toEqual([
      "logs",
      "data",
      "redis_data",
      "certbot/conf",
      "certbot/www",
      "nginx/conf.d",
    ]);
  });
});
