import type { ProvisionContext } from "./context";
import { commandExists, runOrThrow } from "./shell";

const BASE_PACKAGES = [
  "curl",
  "wget",
  "git",
  "vim",
  "ufw",
  "ca-certificates",
  "gnupg",
  "openssl",
];

export const DOCKER_INSTALL_SCRIPT = "curl -fsSL https://get.docker.com | sh";

export const FIREWALL_RULES = ["ssh", "80/tcp", "443/tcp"];

export function updatePackages({ shell }: ProvisionContext): void {
  runOrThrow(shell, "apt", ["update", "-y"]);
  runOrThrow(shell, "apt", ["upgrade", "-y"]);
  runOrThrow(shell, "apt", ["install", "-y", ...BASE_PACKAGES]);
}

export function installDocker({ shell, logger }: ProvisionContext): void {
  if (commandExists(shell, "docker")) {
    logger.warn("Docker is already installed, skipping");
  } else {
    runOrThrow(shell, "sh", ["-c", DOCKER_INSTALL_SCRIPT]);
    runOrThrow(shell, "systemctl", ["enable", "docker"]);
    runOrThrow(shell, "systemctl", ["start", "docker"]);
  }
  runOrThrow(shell, "docker", ["--version"]);
  runOrThrow(shell, "docker", ["compose", "version"]);
}

export function configureFirewall({ shell }: ProvisionContext): void {
  for (const rule of FIREWALL_RULES) {
    runOrThrow(shell, "ufw", ["allow", rule]);
  }
  runOrThrow(shell, "ufw", ["--force", "enable"]);
}
