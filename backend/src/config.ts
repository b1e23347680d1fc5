import path from "node:path";

import type { SmtpSettings } from "./services/adminNotifier";
import { parseStartDate } from "./repositories/fileEditWindowRepository";

export type Settings = Readonly<{
  port: number;
  jwtSecret: string;
  dataDir: string;
  csvPath: string;
  sessionsPath: string;
  windowPath: string;
  logDir: string;
  backupDir: string;
  editableFields: ReadonlyArray<string>;
  immutableFields: ReadonlyArray<string>;
  pollIntervalMs: number;
  sessionTtlMs: number;
  windowDays: number;
  backupRetention: number;
  startMsOverride: number | null;
  readOnly: boolean;
  reminderIntervalMs: number;
  adminEmails: ReadonlyArray<string>;
  smtp: SmtpSettings | null;
}>;

export const DEFAULT_EDITABLE_FIELDS: ReadonlyArray<string> = ["FullName", "DateOfBirth", "BankName", "AccountNumber"];
export const DEFAULT_IMMUTABLE_FIELDS: ReadonlyArray<string> = ["Email", "Phone", "AdmissionNumber"];

function text(value: string | undefined): string {
  return typeof value === "string" ? value.trim() : "";
}

function asBoolean(value: string | undefined): boolean {
  const v = text(value).toLowerCase();
  return v === "true" || v === "1" || v === "yes";
}

function asList(value: string | undefined, fallback: ReadonlyArray<string>): ReadonlyArray<string> {
  const raw = text(value);
  if (!raw) return fallback;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
  return Array.from(new Set(items));
}

function asPositiveNumber(env: NodeJS.ProcessEnv, key: string, fallback: number, integer = false): number {
  const raw = text(env[key]);
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0 || (integer && !Number.isInteger(n))) {
    throw new Error(`${key} must be a positive ${integer ? "integer" : "number"}, got "${raw}".`);
  }
  return n;
}

function resolveSmtp(env: NodeJS.ProcessEnv): SmtpSettings | null {
  const host = text(env.SMTP_HOST);
  const user = text(env.SMTP_USER);
  const pass = env.SMTP_PASS ?? "";
  const from = text(env.SMTP_FROM);
  if (!host && !user && !from) return null;
  const port = asPositiveNumber(env, "SMTP_PORT", 587, true);
  if (!host || !user || pass.trim() === "" || !from) {
    throw new Error("SMTP is partially configured; SMTP_HOST, SMTP_USER, SMTP_PASS and SMTP_FROM are all required.");
  }
  return { host, port, secure: asBoolean(env.SMTP_SECURE), user, pass, from };
}

export function resolveSettingsFromEnv(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Settings {
  const jwtSecret = text(env.JWT_SECRET);
  if (!jwtSecret) {
    throw new Error("Missing JWT_SECRET environment variable.");
  }

  const dataDir = path.resolve(cwd, text(env.DATA_DIR) || path.join("backend", ".data"));
  const csvPath = path.resolve(dataDir, text(env.CSV_PATH) || "registrants.csv");

  const immutableFields = asList(env.IMMUTABLE_FIELDS, DEFAULT_IMMUTABLE_FIELDS);
  const editableFields = asList(env.EDITABLE_FIELDS, DEFAULT_EDITABLE_FIELDS);
  const overlap = editableFields.filter((field) => immutableFields.includes(field));
  if (overlap.length > 0) {
    throw new Error(`Fields cannot be both editable and immutable: ${overlap.join(", ")}.`);
  }

  const startRaw = text(env.START_DATE);
  const startMsOverride = startRaw ? parseStartDate(startRaw) : null;
  if (startRaw && startMsOverride === null) {
    throw new Error(`START_DATE must be an ISO date or timestamp, got "${startRaw}".`);
  }

  const adminEmails = asList(env.ADMIN_EMAILS, []);
  const smtp = resolveSmtp(env);
  if (smtp && adminEmails.length === 0) {
    throw new Error("ADMIN_EMAILS is required when SMTP is configured.");
  }

  return {
    port: asPositiveNumber(env, "PORT", 3000, true),
    jwtSecret,
    dataDir,
    csvPath,
    sessionsPath: path.join(dataDir, "sessions.json"),
    windowPath: path.join(dataDir, "window.json"),
    logDir: path.join(dataDir, "logs"),
    backupDir: path.join(dataDir, "backups"),
    editableFields,
    immutableFields,
    pollIntervalMs: asPositiveNumber(env, "CSV_POLL_INTERVAL_SECONDS", 8) * 1000,
    sessionTtlMs: asPositiveNumber(env, "SESSION_TTL_HOURS", 24) * 60 * 60 * 1000,
    windowDays: asPositiveNumber(env, "EDIT_WINDOW_DAYS", 7, true),
    backupRetention: asPositiveNumber(env, "BACKUP_RETENTION", 100, true),
    startMsOverride,
    readOnly: asBoolean(env.READ_ONLY),
    reminderIntervalMs: asPositiveNumber(env, "REMINDER_INTERVAL_MINUTES", 60) * 60 * 1000,
    adminEmails,
    smtp
  };
}
