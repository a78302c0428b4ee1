import * as p from "@clack/prompts";
import pc from "picocolors";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  step(message: string): void;
  message(message: string): void;
  note(body: string, title?: string): void;
}

export function createClackLogger(): Logger {
  return {
    info: (m) => p.log.info(m),
    success: (m) => p.log.success(pc.green(m)),
    warn: (m) => p.log.warn(pc.yellow(m)),
    error: (m) => p.log.error(pc.red(m)),
    step: (m) => p.log.step(pc.cyan(pc.bold(m))),
    message: (m) => p.log.message(m),
    note: (body, title) => p.note(body, title),
  };
}
