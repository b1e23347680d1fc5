import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import type { ActionLog, Logger } from "./actionLog";
import { createExclusiveLock } from "./exclusiveLock";

export const EMAIL_FIELD = "Email";
export const PHONE_FIELD = "Phone";
export const IDENTITY_FIELDS: ReadonlyArray<string> = [EMAIL_FIELD, PHONE_FIELD];

export type ErrorCode =
  | "NOT_FOUND"
  | "INDEX_OUT_OF_RANGE"
  | "NO_SUCH_FIELD"
  | "STALE_RECORD"
  | "INVALID_INPUT"
  | "IO_FAILURE"
  | "PARSE_FAILURE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type RecordRow = Readonly<Record<string, string>>;

export type Identity = Readonly<{
  email: string;
  phone: string;
}>;

export type TableSnapshot = Readonly<{
  columns: ReadonlyArray<string>;
  rows: ReadonlyArray<RecordRow>;
}>;

export type RecordMatch = Readonly<{
  index: number;
  record: RecordRow;
}>;

export type DuplicateIdentity = Readonly<{
  email: string;
  phone: string;
  indices: ReadonlyArray<number>;
}>;

export type LoadOutcome = Readonly<{
  reloaded: boolean;
  rowCount: number;
  duplicateIdentities: ReadonlyArray<DuplicateIdentity>;
}>;

export type PersistOutcome = Readonly<{
  backupPath: string | null;
}>;

export type FieldEdit = Readonly<{
  index: number;
  field: string;
  value: string;
  identity: Identity;
  reason: string;
}>;

export type EditOutcome = Readonly<{
  oldValue: string;
  newValue: string;
  persisted: Result<PersistOutcome>;
}>;

/** File operations the store needs; swapped out in tests to simulate disk failures. */
export type TableFileSystem = Readonly<{
  statMtimeMs(filePath: string): Promise<number | null>;
  readText(filePath: string): Promise<string>;
  writeText(filePath: string, data: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  copy(fromPath: string, toPath: string): Promise<void>;
  ensureDir(dir: string): Promise<void>;
  list(dir: string): Promise<ReadonlyArray<string>>;
  remove(filePath: string): Promise<void>;
}>;

export type RecordStore = Readonly<{
  load(options?: LoadOptions): Promise<Result<LoadOutcome>>;
  findByIdentity(email: string, phone: string): Promise<Result<RecordMatch>>;
  get(index: number): Promise<Result<RecordRow>>;
  setField(index: number, field: string, value: string): Promise<Result<{ oldValue: string }>>;
  persist(reason: string): Promise<Result<PersistOutcome>>;
  applyEdit(edit: FieldEdit): Promise<Result<EditOutcome>>;
  backup(reason: string): Promise<Result<{ backupPath: string }>>;
  appendRecord(values: Readonly<Record<string, string>>): Promise<Result<RecordMatch>>;
  snapshot(): Promise<TableSnapshot>;
  search(query: string): Promise<ReadonlyArray<RecordMatch>>;
  fileModifiedMs(): Promise<number | null>;
}>;

export type LoadOptions = Readonly<{
  /** Re-parse even when the modification time is unchanged. */
  force?: boolean;
  /** Write a header-only file when none exists; only startup asks for this. */
  createIfMissing?: boolean;
}>;

export type RecordStoreDeps = Readonly<{
  csvPath: string;
  backupDir: string;
  requiredColumns: ReadonlyArray<string>;
  actionLog: ActionLog;
  backupRetention?: number;
  fileSystem?: TableFileSystem;
  nowMs?: () => number;
  logger?: Logger;
}>;

const DEFAULT_BACKUP_RETENTION = 100;

// Matched by shape: fs errors raised in another realm fail instanceof Error.
function isMissingFileError(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}

export const nodeTableFileSystem: TableFileSystem = {
  async statMtimeMs(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mtimeMs;
    } catch (e: unknown) {
      if (isMissingFileError(e)) return null;
      throw e;
    }
  },
  readText: (filePath) => fs.readFile(filePath, "utf8"),
  writeText: (filePath, data) => fs.writeFile(filePath, data, "utf8"),
  rename: (fromPath, toPath) => fs.rename(fromPath, toPath),
  copy: (fromPath, toPath) => fs.copyFile(fromPath, toPath),
  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  },
  list: (dir) => fs.readdir(dir),
  remove: (filePath) => fs.rm(filePath, { force: true })
};

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function describe(e: unknown): string {
  return typeof e === "object" && e !== null && "message" in e && typeof e.message === "string" ? e.message : String(e);
}

export function normalizeIdentity(email: string, phone: string): Identity {
  return {
    email: String(email ?? "").trim().toLowerCase(),
    phone: String(phone ?? "").trim()
  };
}

export function identityOf(record: RecordRow): Identity {
  return normalizeIdentity(record[EMAIL_FIELD] ?? "", record[PHONE_FIELD] ?? "");
}

export function sameIdentity(a: Identity, b: Identity): boolean {
  return a.email === b.email && a.phone === b.phone;
}

function uniqueColumns(columns: ReadonlyArray<string>): string[] {
  const out: string[] = [];
  for (const column of columns) {
    if (!out.includes(column)) out.push(column);
  }
  return out;
}

function hasColumn(table: TableSnapshot, field: string): boolean {
  return table.columns.includes(field);
}

function isCellGrid(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"));
}

export function parseTable(text: string, requiredColumns: ReadonlyArray<string>): Result<TableSnapshot> {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  if (source.trim() === "") {
    return ok({ columns: uniqueColumns(requiredColumns), rows: [] });
  }

  let parsed: unknown;
  try {
    parsed = parse(source, { skip_empty_lines: true, relax_column_count: true });
  } catch (e: unknown) {
    return err("PARSE_FAILURE", `Malformed CSV: ${describe(e)}`);
  }
  if (!isCellGrid(parsed)) {
    return err("PARSE_FAILURE", "Malformed CSV: unexpected parser output.");
  }

  const [header, ...body] = parsed;
  if (!header) {
    return ok({ columns: uniqueColumns(requiredColumns), rows: [] });
  }

  const seen = new Set<string>();
  for (const column of header) {
    if (seen.has(column)) {
      return err("PARSE_FAILURE", `Duplicate column name "${column}".`);
    }
    seen.add(column);
  }

  const columns = uniqueColumns([...header, ...requiredColumns]);
  const rows: RecordRow[] = [];
  for (let i = 0; i < body.length; i += 1) {
    const cells = body[i];
    if (cells.length > header.length) {
      return err("PARSE_FAILURE", `Row ${i + 2} has ${cells.length} cells but the header has ${header.length}.`);
    }
    const entries = columns.map((column, ci): [string, string] => [column, ci < cells.length ? String(cells[ci] ?? "") : ""]);
    rows.push(Object.freeze(Object.fromEntries(entries)));
  }

  return ok({ columns, rows });
}

export function serializeTable(table: TableSnapshot): string {
  const fields = [...table.columns];
  const data = table.rows.map((row) => fields.map((column) => row[column] ?? ""));
  return stringify([fields, ...data], { record_delimiter: "\n" });
}

function findDuplicateIdentities(rows: ReadonlyArray<RecordRow>): DuplicateIdentity[] {
  const byKey = new Map<string, { identity: Identity; indices: number[] }>();
  rows.forEach((row, index) => {
    const identity = identityOf(row);
    if (!identity.email || !identity.phone) return;
    const key = `${identity.email}\u0000${identity.phone}`;
    const entry = byKey.get(key);
    if (entry) entry.indices.push(index);
    else byKey.set(key, { identity, indices: [index] });
  });
  const duplicates: DuplicateIdentity[] = [];
  for (const { identity, indices } of byKey.values()) {
    if (indices.length > 1) duplicates.push({ email: identity.email, phone: identity.phone, indices });
  }
  return duplicates;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

function formatBackupStamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}_` +
    `${pad(d.getUTCHours())}-${pad(d.getUTCMinutes())}-${pad(d.getUTCSeconds())}-${pad(d.getUTCMilliseconds(), 3)}`
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function createRecordStore(deps: RecordStoreDeps): RecordStore {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? console;
  const fileSystem = deps.fileSystem ?? nodeTableFileSystem;
  const backupRetention = deps.backupRetention ?? DEFAULT_BACKUP_RETENTION;
  const actionLog = deps.actionLog;
  const csvPath = deps.csvPath;
  const backupDir = deps.backupDir;

  if (typeof csvPath !== "string" || csvPath.trim() === "") {
    throw new Error("RecordStore requires a non-empty csvPath.");
  }
  if (typeof backupDir !== "string" || backupDir.trim() === "") {
    throw new Error("RecordStore requires a non-empty backupDir.");
  }
  if (!Number.isInteger(backupRetention) || backupRetention <= 0) {
    throw new Error("RecordStore requires a positive integer backupRetention.");
  }

  const requiredColumns = uniqueColumns([...IDENTITY_FIELDS, ...deps.requiredColumns]);
  const tableBase = path.basename(csvPath, path.extname(csvPath));
  const backupNamePattern = new RegExp(`^${escapeRegExp(tableBase)}_\\d{4}-\\d{2}-\\d{2}_\\d{2}-\\d{2}-\\d{2}-\\d{3}\\.csv$`);
  const lock = createExclusiveLock();

  let table: TableSnapshot = { columns: requiredColumns, rows: [] };
  let lastMtimeMs: number | null = null;
  let lastDuplicates: ReadonlyArray<DuplicateIdentity> = [];
  let lastBackupStampMs = 0;

  async function ioFailure(action: string, e: unknown): Promise<ResultErr> {
    const message = describe(e);
    await actionLog.recordError(`${action}: ${message}`);
    return err("IO_FAILURE", `${action}.`, { cause: message });
  }

  function checkIndex(index: number): Result<RecordRow> {
    if (!Number.isInteger(index) || index < 0 || index >= table.rows.length) {
      return err("INDEX_OUT_OF_RANGE", "Record index is out of range.", { index, rowCount: table.rows.length });
    }
    return ok(table.rows[index]);
  }

  // The temp file is renamed over the canonical path, so a crash leaves either the old or the new content.
  async function writeAtomically(content: string): Promise<void> {
    const tmpPath = `${csvPath}.tmp`;
    try {
      await fileSystem.writeText(tmpPath, content);
      await fileSystem.rename(tmpPath, csvPath);
    } catch (e: unknown) {
      try {
        await fileSystem.remove(tmpPath);
      } catch (cleanupError: unknown) {
        logger.warn(`[RegistrantDesk] Could not remove ${tmpPath}: ${describe(cleanupError)}`);
      }
      throw e;
    }
  }

  async function copyToBackup(): Promise<string> {
    const stampMs = Math.max(nowMs(), lastBackupStampMs + 1);
    lastBackupStampMs = stampMs;
    const backupPath = path.join(backupDir, `${tableBase}_${formatBackupStamp(stampMs)}.csv`);
    await fileSystem.ensureDir(backupDir);
    await fileSystem.copy(csvPath, backupPath);
    return backupPath;
  }

  async function pruneBackups(): Promise<void> {
    let names: ReadonlyArray<string>;
    try {
      names = await fileSystem.list(backupDir);
    } catch (e: unknown) {
      await actionLog.recordError(`Failed to list backups in ${backupDir}: ${describe(e)}`);
      return;
    }
    const backups = names.filter((name) => backupNamePattern.test(name)).sort();
    const excess = backups.slice(0, Math.max(0, backups.length - backupRetention));
    let pruned = 0;
    for (const name of excess) {
      try {
        await fileSystem.remove(path.join(backupDir, name));
        pruned += 1;
      } catch (e: unknown) {
        await actionLog.recordError(`Failed to prune backup ${name}: ${describe(e)}`);
      }
    }
    if (pruned > 0) {
      await actionLog.recordAction(`Pruned ${pruned} backup(s) beyond retention of ${backupRetention}`);
    }
  }

  async function loadUnlocked(options: LoadOptions): Promise<Result<LoadOutcome>> {
    let mtimeMs: number | null;
    try {
      mtimeMs = await fileSystem.statMtimeMs(csvPath);
    } catch (e: unknown) {
      return ioFailure(`Failed to stat ${csvPath}`, e);
    }

    if (mtimeMs === null && options.createIfMissing !== true) {
      await actionLog.recordError(`Table file ${csvPath} is missing; keeping ${table.rows.length} loaded rows`);
      return err("IO_FAILURE", "Table file is missing.", { csvPath });
    }

    if (mtimeMs === null) {
      const empty: TableSnapshot = { columns: requiredColumns, rows: [] };
      try {
        await fileSystem.ensureDir(path.dirname(csvPath));
        await writeAtomically(serializeTable(empty));
        mtimeMs = await fileSystem.statMtimeMs(csvPath);
      } catch (e: unknown) {
        return ioFailure(`Failed to create ${csvPath}`, e);
      }
      table = empty;
      lastMtimeMs = mtimeMs;
      lastDuplicates = [];
      logger.warn(`[RegistrantDesk] Table file not found; created ${csvPath} with headers only.`);
      await actionLog.recordAction(`Created empty table file ${csvPath}`);
      return ok({ reloaded: true, rowCount: 0, duplicateIdentities: [] });
    }

    if (options.force !== true && lastMtimeMs !== null && mtimeMs === lastMtimeMs) {
      return ok({ reloaded: false, rowCount: table.rows.length, duplicateIdentities: lastDuplicates });
    }

    let text: string;
    try {
      text = await fileSystem.readText(csvPath);
    } catch (e: unknown) {
      return ioFailure(`Failed to read ${csvPath}`, e);
    }

    const parsed = parseTable(text, requiredColumns);
    if (!parsed.ok) {
      await actionLog.recordError(`Failed to parse ${csvPath}: ${parsed.error.message}`);
      return parsed;
    }

    const duplicates = findDuplicateIdentities(parsed.value.rows);
    table = parsed.value;
    lastMtimeMs = mtimeMs;
    lastDuplicates = duplicates;

    logger.log(`[RegistrantDesk] Table loaded: ${table.rows.length} rows`);
    for (const duplicate of duplicates) {
      logger.warn(
        `[RegistrantDesk] Duplicate identity ${duplicate.email} / ${duplicate.phone} at rows ${duplicate.indices.join(", ")}; row ${duplicate.indices[0]} wins.`
      );
    }
    return ok({ reloaded: true, rowCount: table.rows.length, duplicateIdentities: duplicates });
  }

  function setFieldUnlocked(index: number, field: string, value: string): Result<{ oldValue: string }> {
    const current = checkIndex(index);
    if (!current.ok) return current;
    if (!hasColumn(table, field)) {
      return err("NO_SUCH_FIELD", `Unknown field "${field}".`, { field });
    }
    const oldValue = current.value[field] ?? "";
    const rows = table.rows.slice();
    rows[index] = Object.freeze({ ...current.value, [field]: value });
    table = { columns: table.columns, rows };
    return ok({ oldValue });
  }

  async function persistUnlocked(reason: string): Promise<Result<PersistOutcome>> {
    let backupPath: string | null = null;
    try {
      await fileSystem.ensureDir(path.dirname(csvPath));
      if ((await fileSystem.statMtimeMs(csvPath)) !== null) {
        backupPath = await copyToBackup();
      }
    } catch (e: unknown) {
      return ioFailure(`Backup before save (${reason}) failed`, e);
    }

    try {
      await writeAtomically(serializeTable(table));
    } catch (e: unknown) {
      return ioFailure(`Failed to save table (${reason})`, e);
    }

    try {
      lastMtimeMs = await fileSystem.statMtimeMs(csvPath);
    } catch (e: unknown) {
      lastMtimeMs = null;
      logger.warn(`[RegistrantDesk] Could not stat ${csvPath} after save: ${describe(e)}`);
    }

    if (backupPath) await actionLog.recordAction(`Backup created (${reason}): ${backupPath}`);
    await actionLog.recordAction(`Table saved due to ${reason}`);
    await pruneBackups();
    return ok({ backupPath });
  }

  return {
    load(options: LoadOptions = {}): Promise<Result<LoadOutcome>> {
      return lock.run(() => loadUnlocked(options));
    },

    findByIdentity(email: string, phone: string): Promise<Result<RecordMatch>> {
      return lock.run(() => {
        const claimed = normalizeIdentity(email, phone);
        if (!claimed.email || !claimed.phone) {
          return err("NOT_FOUND", "Record not found.");
        }
        // Duplicates are reported at load time; the first matching row wins.
        const index = table.rows.findIndex((row) => sameIdentity(identityOf(row), claimed));
        if (index === -1) {
          return err("NOT_FOUND", "Record not found.");
        }
        return ok({ index, record: table.rows[index] });
      });
    },

    get(index: number): Promise<Result<RecordRow>> {
      return lock.run(() => checkIndex(index));
    },

    setField(index: number, field: string, value: string): Promise<Result<{ oldValue: string }>> {
      return lock.run(() => setFieldUnlocked(index, field, value));
    },

    persist(reason: string): Promise<Result<PersistOutcome>> {
      return lock.run(() => persistUnlocked(reason));
    },

    applyEdit(edit: FieldEdit): Promise<Result<EditOutcome>> {
      return lock.run(async () => {
        const current = checkIndex(edit.index);
        if (!current.ok) return current;
        if (!sameIdentity(identityOf(current.value), edit.identity)) {
          return err("STALE_RECORD", "The bound record no longer matches this session.", { index: edit.index });
        }
        const set = setFieldUnlocked(edit.index, edit.field, edit.value);
        if (!set.ok) return set;
        // No rollback on a failed save: the in-memory value stays and backups allow reconciliation.
        const persisted = await persistUnlocked(edit.reason);
        return ok({ oldValue: set.value.oldValue, newValue: edit.value, persisted });
      });
    },

    backup(reason: string): Promise<Result<{ backupPath: string }>> {
      return lock.run(async () => {
        let backupPath: string;
        try {
          if ((await fileSystem.statMtimeMs(csvPath)) === null) {
            return err("IO_FAILURE", "Table file does not exist; nothing to back up.");
          }
          backupPath = await copyToBackup();
        } catch (e: unknown) {
          return ioFailure(`Backup (${reason}) failed`, e);
        }
        await actionLog.recordAction(`Backup created (${reason}): ${backupPath}`);
        await pruneBackups();
        return ok({ backupPath });
      });
    },

    appendRecord(values: Readonly<Record<string, string>>): Promise<Result<RecordMatch>> {
      return lock.run(async () => {
        for (const field of Object.keys(values)) {
          if (!hasColumn(table, field)) {
            return err("NO_SUCH_FIELD", `Unknown field "${field}".`, { field });
          }
        }
        const identity = normalizeIdentity(values[EMAIL_FIELD] ?? "", values[PHONE_FIELD] ?? "");
        if (!identity.email || !identity.phone) {
          return err("INVALID_INPUT", "Email and Phone are required.");
        }
        if (table.rows.some((row) => sameIdentity(identityOf(row), identity))) {
          return err("INVALID_INPUT", "A record with this email and phone already exists.");
        }

        const record: RecordRow = Object.freeze(
          Object.fromEntries(table.columns.map((column): [string, string] => [column, String(values[column] ?? "").trim()]))
        );
        const previous = table;
        table = { columns: previous.columns, rows: [...previous.rows, record] };
        const index = table.rows.length - 1;

        const persisted = await persistUnlocked("admin_add_record");
        if (!persisted.ok) {
          table = previous;
          return persisted;
        }
        return ok({ index, record });
      });
    },

    snapshot(): Promise<TableSnapshot> {
      return lock.run(() => table);
    },

    search(query: string): Promise<ReadonlyArray<RecordMatch>> {
      return lock.run(() => {
        const needle = query.trim().toLowerCase();
        if (!needle) return [];
        const matches: RecordMatch[] = [];
        table.rows.forEach((record, index) => {
          if (table.columns.some((column) => (record[column] ?? "").toLowerCase().includes(needle))) {
            matches.push({ index, record });
          }
        });
        return matches;
      });
    },

    fileModifiedMs(): Promise<number | null> {
      return lock.run(() => fileSystem.statMtimeMs(csvPath));
    }
  };
}
