import * as p from "@clack/prompts";
import { isCancel } from "@clack/prompts";
import pc from "picocolors";
import { domainLooksValid, normalizeDomain } from "./config";
import type { ProvisionConfig, ProvisionSettings } from "./types";

export function emailLooksValid(val: string) {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(val);
}

/** `admin@` the parent domain: relay.example.com → admin@example.com */
export function fallbackEmail(domain: string) {
  const labels = domain.split(".");
  const parent = labels.length > 2 ? labels.slice(1).join(".") : domain;
  return `admin@${parent}`;
}

export function resolveEmail(input: string | undefined, domain: string) {
  const t = input?.trim();
  if (t) return { email: t, usedFallback: false };
  return { email: fallbackEmail(domain), usedFallback: true };
}

/** A fallback email follows the domain; a typed one is kept. */
export function changeDomain(
  settings: ProvisionSettings,
  domain: string,
  emailIsFallback: boolean
): ProvisionSettings {
  return {
    domain,
    email: emailIsFallback ? fallbackEmail(domain) : settings.email,
  };
}

export function formatSummary(
  settings: ProvisionSettings,
  config: ProvisionConfig
) {
  return [
    `Domain:       ${settings.domain}`,
    `Email:        ${settings.email}`,
    `Deploy dir:   ${config.deployDir}`,
    `Repository:   ${config.repoUrl}`,
  ].join("\n");
}

const prompts = {
  domain: (initialValue?: string) =>
    p.text({
      message: "Domain to serve over HTTPS",
      placeholder: "relay.example.com",
      initialValue,
      validate(v) {
        const t = normalizeDomain(v);
        if (!t) return "Please enter a domain.";
        if (!domainLooksValid(t)) {
          return "Please enter a valid domain (e.g., relay.example.com).";
        }
      },
    }),

  email: (initialValue?: string) =>
    p.text({
      message: "Email for the SSL certificate",
      placeholder: "leave blank for the default",
      initialValue,
      validate(v) {
        const t = v?.trim();
        if (t && !emailLooksValid(t)) return "That doesn't look like an email.";
      },
    }),
};

async function askEmail(domain: string, initialValue?: string) {
  const v = await prompts.email(initialValue);
  if (isCancel(v)) return null;
  const resolved = resolveEmail(v, domain);
  if (resolved.usedFallback) {
    p.log.warn(`Using default email: ${pc.bold(resolved.email)}`);
  }
  return resolved;
}

interface Answers {
  settings: ProvisionSettings;
  emailIsFallback: boolean;
}

async function askAll(config: ProvisionConfig): Promise<Answers | null> {
  let domain = config.domain ?? null;
  if (!domain) {
    const v = await prompts.domain();
    if (isCancel(v)) return null;
    domain = normalizeDomain(v);
  }
  if (!domain) return null;

  const answer = await askEmail(domain);
  if (answer === null) return null;

  return {
    settings: { domain, email: answer.email },
    emailIsFallback: answer.usedFallback,
  };
}

async function editLoop(
  answers: Answers,
  config: ProvisionConfig
): Promise<"confirm" | "cancel"> {
  while (true) {
    const { settings } = answers;
    p.note(formatSummary(settings, config), "Review configuration");
    const choice = await p.select({
      message: "What would you like to do?",
      options: [
        { value: "confirm", label: "Start provisioning" },
        { value: "email", label: "Change email" },
        { value: "domain", label: "Change domain" },
        { value: "cancel", label: "Cancel" },
      ],
      initialValue: "confirm",
    });
    if (isCancel(choice) || choice === "cancel") return "cancel";
    if (choice === "confirm") return "confirm";

    if (choice === "domain") {
      const v = await prompts.domain(settings.domain);
      const domain = isCancel(v) ? null : normalizeDomain(v);
      if (domain) {
        answers.settings = changeDomain(
          settings,
          domain,
          answers.emailIsFallback
        );
      }
    } else {
      const answer = await askEmail(settings.domain, settings.email);
      if (answer !== null) {
        answers.settings = { ...settings, email: answer.email };
        answers.emailIsFallback = answer.usedFallback;
      }
    }
  }
}

export async function collectSettings(
  config: ProvisionConfig
): Promise<ProvisionSettings | null> {
  const answers = await askAll(config);
  if (!answers) {
    p.cancel("Setup cancelled.");
    return null;
  }

  if ((await editLoop(answers, config)) === "cancel") {
    p.cancel("Setup cancelled.");
    return null;
  }
  return answers.settings;
}
