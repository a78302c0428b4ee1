import type { ProvisionState } from "./types";

export class CommandError extends Error {
  readonly command: string;
  readonly status: number;

  constructor(command: string, args: string[], status: number) {
    const line = [command, ...args].join(" ");
    super(`Command failed with exit code ${status}: ${line}`);
    this.name = "CommandError";
    this.command = line;
    this.status = status;
  }
}

export class CertificateError extends Error {
  readonly status: number;

  constructor(status: number) {
    super("SSL certificate request failed, check the DNS configuration.");
    this.name = "CertificateError";
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CancelledError extends Error {
  constructor(message = "Cancelled.") {
    super(message);
    this.name = "CancelledError";
  }
}

/** A step failed; `state` is the last state the host reached. */
export class ProvisionError extends Error {
  readonly state: ProvisionState;

  constructor(message: string, state: ProvisionState, cause: unknown) {
    super(message, { cause });
    this.name = "ProvisionError";
    this.state = state;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
