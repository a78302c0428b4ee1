import type { ProvisionContext } from "./context";
import { CertificateError } from "./errors";
import { runOrThrow } from "./shell";
import { APP_SERVICE, WEBROOT } from "./templates";

function compose(ctx: ProvisionContext, args: string[]) {
  return ["compose", "-f", ctx.paths.composeFile, ...args];
}

/** Brings up everything the HTTP-01 challenge needs to be served. */
export async function startStack(ctx: ProvisionContext): Promise<void> {
  runOrThrow(ctx.shell, "docker", compose(ctx, ["up", "-d", "nginx", "redis", APP_SERVICE]), {
    cwd: ctx.paths.deployDir,
  });
  await ctx.sleep(ctx.config.warmupMs);
}

export function certbotArgs(email: string, domain: string): string[] {
  return [
    "run",
    "--rm",
    "certbot",
    "certonly",
    "--webroot",
    `--webroot-path=${WEBROOT}`,
    "--email",
    email,
    "--agree-tos",
    "--no-eff-email",
    "-d",
    domain,
  ];
}

/** Single attempt; a failed issuance aborts the run. */
export function requestCertificate(ctx: ProvisionContext): void {
  const { email, domain } = ctx.settings;
  const status = ctx.shell.run("docker", compose(ctx, certbotArgs(email, domain)), {
    cwd: ctx.paths.deployDir,
  });
  if (status !== 0) throw new CertificateError(status);
}

export function restartProxy(ctx: ProvisionContext): void {
  runOrThrow(ctx.shell, "docker", compose(ctx, ["restart", "nginx"]), {
    cwd: ctx.paths.deployDir,
  });
}
