import type { ProvisionContext } from "./context";
import { ProvisionError, errorMessage } from "./errors";
import { configureFirewall, installDocker, updatePackages } from "./system";
import { fetchRepository } from "./repo";
import { writeEnvFile } from "./env-file";
import {
  writeComposeFile,
  writeHttpProxyConfig,
  writeHttpsProxyConfig,
} from "./render";
import { checkDns } from "./dns";
import { requestCertificate, restartProxy, startStack } from "./certificate";
import type { ProvisionState } from "./types";

export interface ProvisionStep {
  title: string;
  /** State the host is in once this step has succeeded. */
  reaches: ProvisionState;
  done: string;
  /** Follow-up of the previous step, logged without a `[n/total]` number. */
  unnumbered?: boolean;
  run(ctx: ProvisionContext): void | Promise<void>;
}

export const PROVISION_STEPS: readonly ProvisionStep[] = [
  {
    title: "Updating system packages",
    reaches: "packages-ready",
    done: "System packages up to date",
    run: updatePackages,
  },
  {
    title: "Installing Docker",
    reaches: "runtime-ready",
    done: "Docker ready",
    run: installDocker,
  },
  {
    title: "Configuring firewall",
    reaches: "firewall-ready",
    done: "Firewall allows SSH, 80 and 443",
    run: configureFirewall,
  },
  {
    title: "Fetching repository",
    reaches: "repo-ready",
    done: "Repository ready",
    run: fetchRepository,
  },
  {
    title: "Generating environment file",
    reaches: "config-ready",
    done: ".env ready",
    run: (ctx) => {
      writeEnvFile(ctx);
    },
  },
  {
    title: "Writing Docker Compose file",
    reaches: "compose-rendered",
    done: "Docker Compose file ready",
    run: (ctx) => {
      writeComposeFile(ctx);
    },
  },
  {
    title: "Writing initial nginx config",
    reaches: "proxy-rendered-http",
    done: "nginx serves the ACME challenge over HTTP",
    run: writeHttpProxyConfig,
  },
  {
    title: "Checking DNS",
    reaches: "dns-confirmed",
    done: "DNS check complete",
    run: async (ctx) => {
      await checkDns(ctx);
    },
  },
  {
    title: "Requesting SSL certificate",
    reaches: "cert-acquired",
    done: "SSL certificate issued",
    run: async (ctx) => {
      await startStack(ctx);
      requestCertificate(ctx);
    },
  },
  {
    title: "Switching nginx to HTTPS",
    reaches: "proxy-rendered-https",
    done: "HTTPS nginx config written",
    unnumbered: true,
    run: writeHttpsProxyConfig,
  },
  {
    title: "Restarting nginx",
    reaches: "running",
    done: "nginx restarted",
    unnumbered: true,
    run: restartProxy,
  },
];

/**
 * Runs the steps in order. No step is retried and nothing is rolled back:
 * a failure leaves the host where it stopped for the next run's guards.
 */
export async function runProvisioning(
  ctx: ProvisionContext,
  steps: readonly ProvisionStep[] = PROVISION_STEPS
): Promise<ProvisionState> {
  let state: ProvisionState = "uninitialized";
  const total = steps.filter((s) => !s.unnumbered).length;
  let n = 0;

  for (const step of steps) {
    ctx.logger.step(
      step.unnumbered ? step.title : `[${++n}/${total}] ${step.title}`
    );
    try {
      await step.run(ctx);
    } catch (err) {
      throw new ProvisionError(
        `${step.title} failed: ${errorMessage(err)}`,
        state,
        err
      );
    }
    state = step.reaches;
    ctx.logger.success(step.done);
  }

  return state;
}
