import fs from "node:fs/promises";
import path from "node:path";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type ActionLog = Readonly<{
  recordAction(line: string): Promise<void>;
  recordError(line: string): Promise<void>;
  actionLogPath: string;
  errorLogPath: string;
}>;

export type ActionLogDeps = Readonly<{
  logDir: string;
  nowMs?: () => number;
  logger?: Logger;
}>;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatLogTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ` +
    `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`
  );
}

function singleLine(text: string): string {
  return text.replace(/[\r\n]+/g, " ").trim();
}

export function createActionLog(deps: ActionLogDeps): ActionLog {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? console;

  if (typeof deps.logDir !== "string" || deps.logDir.trim() === "") {
    throw new Error("ActionLog requires a non-empty logDir.");
  }

  const actionLogPath = path.join(deps.logDir, "actions.log");
  const errorLogPath = path.join(deps.logDir, "errors.log");

  async function append(filePath: string, line: string): Promise<void> {
    const entry = `[${formatLogTimestamp(nowMs())}] ${singleLine(line)}\n`;
    try {
      await fs.mkdir(deps.logDir, { recursive: true });
      await fs.appendFile(filePath, entry, "utf8");
    } catch (e: unknown) {
      // Log files are best-effort; the operation being logged has already happened.
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[RegistrantDesk] Failed to append to ${path.basename(filePath)}: ${message}`);
    }
  }

  return {
    actionLogPath,
    errorLogPath,

    recordAction(line: string): Promise<void> {
      return append(actionLogPath, line);
    },

    recordError(line: string): Promise<void> {
      logger.error(`[RegistrantDesk] ${singleLine(line)}`);
      return append(errorLogPath, line);
    }
  };
}
