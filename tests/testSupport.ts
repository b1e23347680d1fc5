import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../backend/src/services/actionLog";

export type CapturedLine = Readonly<{ level: "log" | "warn" | "error"; text: string }>;

export type CapturingLogger = Logger & Readonly<{ lines: CapturedLine[] }>;

export function createCapturingLogger(): CapturingLogger {
  const lines: CapturedLine[] = [];
  const capture =
    (level: CapturedLine["level"]) =>
    (...args: unknown[]): void => {
      lines.push({ level, text: args.map(String).join(" ") });
    };
  return { lines, log: capture("log"), warn: capture("warn"), error: capture("error") };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `registrant-desk-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A clock the test moves by hand. */
export function createClock(startMs: number): Readonly<{ now: () => number; set(ms: number): void; advance(ms: number): void }> {
  let current = startMs;
  return {
    now: () => current,
    set(ms: number) {
      current = ms;
    },
    advance(ms: number) {
      current += ms;
    }
  };
}
