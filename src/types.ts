export type ProvisionState =
  | "uninitialized"
  | "packages-ready"
  | "runtime-ready"
  | "firewall-ready"
  | "repo-ready"
  | "config-ready"
  | "compose-rendered"
  | "proxy-rendered-http"
  | "dns-confirmed"
  | "cert-acquired"
  | "proxy-rendered-https"
  | "running";

export interface ProvisionConfig {
  domain?: string | null;
  deployDir: string;
  repoUrl: string;
  appImage: string;
  bindHost: string;
  warmupMs: number;
}

export interface ProvisionSettings {
  domain: string;
  email: string;
}

export interface DeployPaths {
  deployDir: string;
  envFile: string;
  composeFile: string; // name passed to `docker compose -f`, cwd = deployDir
  composePath: string;
  nginxConf: string;
  initJson: string;
  scaffoldDirs: string[];
}

export interface DnsReport {
  serverIp: string | null;
  dnsIp: string | null;
}
