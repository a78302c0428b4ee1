import * as p from "@clack/prompts";
import pc from "picocolors";
import { loadConfig, makePaths } from "./config";
import { createContext } from "./context";
import { CancelledError, ProvisionError, errorMessage } from "./errors";
import { runPreflight } from "./preflight";
import { runProvisioning } from "./provisioner";
import { collectSettings } from "./settings";
import { makeShellRunner } from "./shell";
import { printSummary } from "./summary";

// The DNS gate and the email prompt need a terminal
const isTTY = process.stdout.isTTY && process.stdin.isTTY;

async function main() {
  if (!isTTY) {
    console.log("relay-provision requires an interactive terminal.");
    process.exit(1);
  }

  p.intro(pc.cyan(pc.bold("Claude Relay Service · host provisioning")));

  const config = loadConfig();
  await runPreflight(makeShellRunner());

  const settings = await collectSettings(config);
  if (!settings) process.exit(1);

  const ctx = createContext(config, settings, makePaths(config.deployDir));
  await runProvisioning(ctx);
  printSummary(ctx);

  p.outro(pc.dim(`Served at https://${settings.domain}`));
  process.exit(0);
}

main().catch((err: unknown) => {
  const cause = err instanceof ProvisionError ? err.cause : err;
  if (cause instanceof CancelledError) {
    p.cancel(cause.message);
    process.exit(1);
  }

  p.cancel("Provisioning stopped.");
  // terse message, no stack for operators
  console.error(pc.red(errorMessage(err)));
  if (err instanceof ProvisionError) {
    console.error(
      pc.dim(`Host left at stage "${err.state}". Re-run to continue from there.`)
    );
  }
  process.exit(1);
});
