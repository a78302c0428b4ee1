import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import pc from "picocolors";
import { setTimeout as delay } from "node:timers/promises";
import { createClackLogger, type Logger } from "./logger";
import { makeShellRunner, type ShellRunner } from "./shell";
import { CancelledError } from "./errors";
import { makeNetworkProbe, type NetworkProbe } from "./dns";
import type { DeployPaths, ProvisionConfig, ProvisionSettings } from "./types";

export interface Prompter {
  /** Blocks until the operator presses Enter. Throws CancelledError on Ctrl+C. */
  pause(message: string): Promise<void>;
}

export interface ProvisionContext {
  config: ProvisionConfig;
  settings: ProvisionSettings;
  paths: DeployPaths;
  shell: ShellRunner;
  logger: Logger;
  prompter: Prompter;
  network: NetworkProbe;
  sleep(ms: number): Promise<void>;
}

export async function pressEnterToContinue(
  message = "Press Enter to continue"
) {
  const res = await p.text({
    message: pc.dim(message),
    placeholder: "",
    initialValue: "",
  });
  if (isCancel(res)) throw new CancelledError();
}

export function makeClackPrompter(): Prompter {
  return { pause: (message) => pressEnterToContinue(message) };
}

export function createContext(
  config: ProvisionConfig,
  settings: ProvisionSettings,
  paths: DeployPaths
): ProvisionContext {
  return {
    config,
    settings,
    paths,
    shell: makeShellRunner(),
    logger: createClackLogger(),
    prompter: makeClackPrompter(),
    network: makeNetworkProbe(),
    sleep: async (ms) => {
      await delay(ms);
    },
  };
}
