import { resolve4 } from "node:dns/promises";
import { isIPv4 } from "node:net";
import pc from "picocolors";
import type { ProvisionContext } from "./context";
import type { DnsReport } from "./types";

const PUBLIC_IP_ENDPOINTS = ["https://ifconfig.me", "https://icanhazip.com"];
const PUBLIC_IP_TIMEOUT_MS = 10_000;

export interface NetworkProbe {
  publicIp(): Promise<string | null>;
  /** First A record for the domain, or null when nothing resolves. */
  resolveA(domain: string): Promise<string | null>;
}

async function fetchIp(url: string): Promise<string | null> {
  try {
    const res = await fetch(url, {
      headers: { "User-Agent": "curl/8" }, // ifconfig.me serves HTML otherwise
      signal: AbortSignal.timeout(PUBLIC_IP_TIMEOUT_MS),
    });
    if (!res.ok) return null;
    const body = (await res.text()).trim();
    // rate-limit and captive-portal pages come back as 200 too
    return isIPv4(body) ? body : null;
  } catch {
    return null;
  }
}

export function makeNetworkProbe(): NetworkProbe {
  return {
    async publicIp() {
      for (const url of PUBLIC_IP_ENDPOINTS) {
        const ip = await fetchIp(url);
        if (ip) return ip;
      }
      return null;
    },
    async resolveA(domain) {
      try {
        const records = await resolve4(domain);
        return records[0] ?? null;
      } catch {
        // ENOTFOUND, ENODATA, SERVFAIL: no record yet
        return null;
      }
    },
  };
}

/** Record name to create at the DNS provider: the first label, or `@` for an apex. */
export function dnsRecordName(domain: string): string {
  const labels = domain.split(".");
  return labels.length > 2 ? labels[0] : "@";
}

export function formatDnsInstructions(domain: string, serverIp: string | null) {
  return [
    "Add this DNS record at your provider (e.g. Cloudflare):",
    "",
    `  Type:    A`,
    `  Name:    ${dnsRecordName(domain)}`,
    `  Content: ${serverIp ?? "<this server's public IP>"}`,
    `  Proxy:   off (DNS only, grey cloud)`,
  ].join("\n");
}

export async function checkDns(ctx: ProvisionContext): Promise<DnsReport> {
  const { domain } = ctx.settings;
  const serverIp = await ctx.network.publicIp();
  const dnsIp = await ctx.network.resolveA(domain);

  ctx.logger.message(
    [
      `Server IP:    ${serverIp ?? pc.dim("unknown")}`,
      `DNS resolves: ${dnsIp ?? pc.dim("(none)")}`,
    ].join("\n")
  );

  if (!dnsIp) {
    ctx.logger.warn(`Domain ${domain} does not resolve yet`);
    ctx.logger.note(formatDnsInstructions(domain, serverIp), "DNS record");
    await ctx.prompter.pause("Press Enter once the DNS record is in place");
  } else if (serverIp && dnsIp !== serverIp) {
    ctx.logger.warn(
      `${domain} resolves to ${dnsIp}, not this server (${serverIp}); the certificate request may fail`
    );
  }

  return { serverIp, dnsIp };
}
