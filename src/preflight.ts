import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import process from "node:process";
import { CancelledError } from "./errors";
import { commandExists, getCmdVersion, type ShellRunner } from "./shell";

export type Ok = {
  ok: true;
  name: string;
  version?: string;
  required: boolean;
};

export type Fail = {
  ok: false;
  name: string;
  reason: string; // concise, no links here
  required: boolean;
  hint?: string;
};

export type CheckResult = Ok | Fail;

export interface HostFacts {
  nodeVersion: string;
  platform: NodeJS.Platform;
  uid: number | null; // null where getuid is unavailable
}

const MIN_NODE = "20.0.0";

export function compareSemver(a: string, b: string): number {
  const pa = a.split(".").map(Number);
  const pb = b.split(".").map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? 0;
    const y = pb[i] ?? 0;
    if (x > y) return 1;
    if (x < y) return -1;
  }
  return 0;
}

export function currentHost(): HostFacts {
  return {
    nodeVersion: process.versions.node,
    platform: process.platform,
    uid: process.getuid ? process.getuid() : null,
  };
}

export function checkNode(host: HostFacts, required = true): CheckResult {
  if (compareSemver(host.nodeVersion, MIN_NODE) < 0) {
    return {
      ok: false,
      name: "Node.js",
      required,
      reason: `Detected ${host.nodeVersion}, requires >= ${MIN_NODE}`,
      hint: "Install Node 20+ (LTS recommended).",
    };
  }
  return { ok: true, name: "Node.js", version: host.nodeVersion, required };
}

export function checkPlatform(host: HostFacts, required = true): CheckResult {
  return host.platform === "linux"
    ? { ok: true, name: "Linux", required }
    : {
        ok: false,
        name: "Linux",
        required,
        reason: `Detected ${host.platform}`,
        hint: "Run this on the Debian/Ubuntu server you are deploying to.",
      };
}

export function checkRoot(host: HostFacts, required = true): CheckResult {
  return host.uid === 0
    ? { ok: true, name: "root", required }
    : {
        ok: false,
        name: "root",
        required,
        reason: "Not running as root",
        hint: "Re-run with sudo; apt, ufw and docker need root.",
      };
}

export function checkApt(shell: ShellRunner, required = true): CheckResult {
  const v = getCmdVersion(shell, "apt-get");
  return v
    ? { ok: true, name: "apt-get", version: v, required }
    : {
        ok: false,
        name: "apt-get",
        required,
        reason: "Not found",
        hint: "Only Debian and Ubuntu hosts are supported.",
      };
}

export function checkSystemd(shell: ShellRunner, required = false): CheckResult {
  return commandExists(shell, "systemctl")
    ? { ok: true, name: "systemctl", required }
    : {
        ok: false,
        name: "systemctl",
        required,
        reason: "Not found",
        hint: "Needed to enable Docker when it is not installed yet.",
      };
}

export function runChecks(shell: ShellRunner, host: HostFacts): CheckResult[] {
  return [
    checkNode(host),
    checkPlatform(host),
    checkRoot(host),
    checkApt(shell),
    checkSystemd(shell),
  ];
}

export function formatFailures(failures: Fail[]): string {
  const lines: string[] = ["Some requirements are not met:", ""];
  for (const f of failures) {
    lines.push(`• ${f.name}: ${f.reason}`);
    if (f.hint) lines.push(`  - ${f.hint}`);
    lines.push("");
  }
  return lines.join("\n");
}

export async function runPreflight(shell: ShellRunner): Promise<void> {
  const s = p.spinner();
  s.start("Checking host");
  const results = runChecks(shell, currentHost());
  const failures = results.filter((r): r is Fail => !r.ok);
  s.stop(failures.length === 0 ? "Host checks ✓" : "Host checks ✗");

  if (failures.length === 0) {
    p.log.message("All requirements satisfied.");
    return;
  }

  p.note(formatFailures(failures), "Preflight");

  if (failures.some((f) => f.required)) {
    throw new CancelledError("Please resolve the above and re-run the installer.");
  }

  const cont = await p.confirm({
    message: "Only recommended checks failed. Continue anyway?",
    initialValue: false,
  });

  if (isCancel(cont) || !cont) throw new CancelledError("Aborted.");
}
