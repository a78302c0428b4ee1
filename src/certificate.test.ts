import { describe, expect, it } from "vitest";
import { certbotArgs, requestCertificate, restartProxy, startStack } from "./certificate";
import { CertificateError } from "./errors";
import { createFakeShell, createTestContext } from "./test-utils";

const DEPLOY_DIR = "/srv/relay";

describe("startStack", () => {
  it("starts proxy, app and redis, then waits for them", async () => {
    const { ctx, shell, sleeps } = createTestContext({ deployDir: DEPLOY_DIR });

    await startStack(ctx);

    expect(shell.lines()).toEqual([
      "docker compose -f docker-compose.prod.yml up -d nginx redis claude-relay",
    ]);
    expect(shell.runs[0].cwd).toBe(DEPLOY_DIR);
    expect(sleeps).toEqual([5000]);
  });
});

describe("requestCertificate", () => {
  it("runs a single webroot request", () => {
    const { ctx, shell } = createTestContext({ deployDir: DEPLOY_DIR });

    requestCertificate(ctx);

    expect(shell.lines()).toEqual([
      "docker compose -f docker-compose.prod.yml run --rm certbot certonly --webroot --webroot-path=/var/www/certbot --email ops@example.com --agree-tos --no-eff-email -d relay.example.com",
    ]);
  });

  it("throws CertificateError on a non-zero exit", () => {
    const shell = createFakeShell({ exitCode: () => 1 });
    const { ctx } = createTestContext({ shell, deployDir: DEPLOY_DIR });

    expect(() => requestCertificate(ctx)).toThrow(CertificateError);
    expect(shell.runs).toHaveLength(1);
  });
});

describe("certbotArgs", () => {
  it("passes the email and domain as separate arguments", () => {
    const args = certbotArgs("a b@example.com", "relay.example.com");
    expect(args.slice(-5)).toEqual([
      "a b@example.com",
      "--agree-tos",
      "--no-eff-email",
      "-d",
      "relay.example.com",
    ]);
  });
});

describe("restartProxy", () => {
  it("restarts only nginx", () => {
    const { ctx, shell } = createTestContext({ deployDir: DEPLOY_DIR });
    restartProxy(ctx);
    expect(shell.lines()).toEqual([
      "docker compose -f docker-compose.prod.yml restart nginx",
    ]);
  });
});
