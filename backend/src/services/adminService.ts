import type { ActionLog, Logger } from "./actionLog";
import type { EditWindowService, ErrorCode as WindowErrorCode, WindowChange } from "./editWindowService";
import type { ErrorCode as StoreErrorCode, LoadOutcome, RecordMatch, RecordStore, TableSnapshot } from "./recordStore";
import type { SessionService } from "./sessionService";

export type ErrorCode = StoreErrorCode | WindowErrorCode;

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

/** Pushes a text to one chat; false when the chat has no live connection. */
export type MessageSender = Readonly<{
  deliver(chatId: string, text: string): boolean;
}>;

export type AdminStats = Readonly<{
  rowCount: number;
  daysSinceStart: number;
  daysLeft: number;
  editingAllowed: boolean;
  readOnly: boolean;
  activeSessions: number;
}>;

export type BroadcastOutcome = Readonly<{
  recipients: number;
  delivered: number;
  failed: number;
}>;

export type AdminService = Readonly<{
  listRecords(): Promise<TableSnapshot>;
  reload(): Promise<Result<LoadOutcome>>;
  stats(): Promise<AdminStats>;
  backup(): Promise<Result<{ backupPath: string }>>;
  search(query: string): Promise<Result<ReadonlyArray<RecordMatch>>>;
  resetWindow(startMs: number): Promise<Result<WindowChange>>;
  openWindow(): Promise<WindowChange>;
  disableWindow(): Promise<WindowChange>;
  broadcast(text: string): Promise<Result<BroadcastOutcome>>;
  addRecord(values: Readonly<Record<string, string>>): Promise<Result<RecordMatch>>;
}>;

export type AdminServiceDeps = Readonly<{
  records: Pick<RecordStore, "snapshot" | "load" | "backup" | "search" | "appendRecord">;
  window: Pick<EditWindowService, "status" | "resetWindow" | "openWindow" | "disableWindow">;
  sessions: Pick<SessionService, "listActive">;
  sender: MessageSender;
  actionLog: ActionLog;
  logger?: Logger;
}>;

export const MAX_BROADCAST_LENGTH = 1000;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function createAdminService(deps: AdminServiceDeps): AdminService {
  const logger = deps.logger ?? console;

  async function recordWindowChange(action: string, change: WindowChange): Promise<WindowChange> {
    await deps.actionLog.recordAction(`${action}; start ${new Date(change.startMs).toISOString()}`);
    if (!change.persisted) {
      logger.warn("[RegistrantDesk] Edit window change applied in memory only; it will not survive a restart.");
    }
    return change;
  }

  return {
    listRecords(): Promise<TableSnapshot> {
      return deps.records.snapshot();
    },

    async reload(): Promise<Result<LoadOutcome>> {
      const loaded = await deps.records.load({ force: true });
      if (!loaded.ok) return loaded;
      await deps.actionLog.recordAction(`Admin reloaded table (${loaded.value.rowCount} rows)`);
      return loaded;
    },

    async stats(): Promise<AdminStats> {
      const table = await deps.records.snapshot();
      const window = deps.window.status();
      return {
        rowCount: table.rows.length,
        daysSinceStart: window.daysSinceStart,
        daysLeft: window.daysLeft,
        editingAllowed: window.editingAllowed,
        readOnly: window.readOnly,
        activeSessions: deps.sessions.listActive().length
      };
    },

    backup(): Promise<Result<{ backupPath: string }>> {
      return deps.records.backup("admin_manual");
    },

    async search(query: string): Promise<Result<ReadonlyArray<RecordMatch>>> {
      const needle = String(query ?? "").trim();
      if (!needle) {
        return err("INVALID_INPUT", "A search query is required.");
      }
      return ok(await deps.records.search(needle));
    },

    async resetWindow(startMs: number): Promise<Result<WindowChange>> {
      const reset = deps.window.resetWindow(startMs);
      if (!reset.ok) return err(reset.error.code, reset.error.message, reset.error.context);
      return ok(await recordWindowChange("Admin reset the edit window", reset.value));
    },

    async openWindow(): Promise<WindowChange> {
      return recordWindowChange("Admin opened a new edit window", deps.window.openWindow());
    },

    async disableWindow(): Promise<WindowChange> {
      return recordWindowChange("Admin disabled editing", deps.window.disableWindow());
    },

    async broadcast(text: string): Promise<Result<BroadcastOutcome>> {
      const message = String(text ?? "").trim();
      if (!message || message.length > MAX_BROADCAST_LENGTH) {
        return err("INVALID_INPUT", `Broadcast text must be 1 to ${MAX_BROADCAST_LENGTH} characters.`, {
          length: message.length
        });
      }
      const recipients = deps.sessions.listActive();
      let delivered = 0;
      for (const session of recipients) {
        if (deps.sender.deliver(session.chatId, message)) delivered += 1;
      }
      const failed = recipients.length - delivered;
      await deps.actionLog.recordAction(`Admin broadcast to ${recipients.length} session(s): ${delivered} delivered, ${failed} failed`);
      return ok({ recipients: recipients.length, delivered, failed });
    },

    async addRecord(values: Readonly<Record<string, string>>): Promise<Result<RecordMatch>> {
      const added = await deps.records.appendRecord(values);
      if (!added.ok) return added;
      await deps.actionLog.recordAction(`Admin added record at row ${added.value.index}`);
      return added;
    }
  };
}
