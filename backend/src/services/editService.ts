import type { ActionLog, Logger } from "./actionLog";
import type { EditWindowService, WindowStatus } from "./editWindowService";
import type { RecordRow, RecordStore } from "./recordStore";
import { IDENTITY_FIELDS, identityOf, sameIdentity } from "./recordStore";
import type { SessionService, VerifiedSession } from "./sessionService";

export type ErrorCode =
  | "NOT_VERIFIED"
  | "SESSION_EXPIRED"
  | "IMMUTABLE_FIELD"
  | "WINDOW_CLOSED"
  | "NO_PENDING_FIELD"
  | "PERSIST_FAILED"
  | "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type EditState = "Idle" | "FieldChosen" | "AwaitingValue" | "Applied";

export type OwnRecordView = Readonly<{
  recordIndex: number;
  record: RecordRow;
  editableFields: ReadonlyArray<string>;
  window: WindowStatus;
}>;

export type FieldChoice = Readonly<{
  field: string;
  state: Extract<EditState, "AwaitingValue">;
}>;

export type AppliedEdit = Readonly<{
  field: string;
  oldValue: string;
  newValue: string;
}>;

export type EditService = Readonly<{
  viewOwnRecord(chatId: string): Promise<Result<OwnRecordView>>;
  chooseField(chatId: string, field: string): Promise<Result<FieldChoice>>;
  submitValue(chatId: string, newValue: string): Promise<Result<AppliedEdit>>;
}>;

export type EditServiceDeps = Readonly<{
  records: Pick<RecordStore, "get" | "applyEdit">;
  sessions: Pick<SessionService, "requireActive" | "setPendingField" | "clearPendingField" | "logout">;
  window: Pick<EditWindowService, "isEditingAllowed" | "status">;
  editableFields: ReadonlyArray<string>;
  immutableFields: ReadonlyArray<string>;
  actionLog: ActionLog;
  logger?: Logger;
}>;

const MAX_VALUE_LENGTH = 500;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function createEditService(deps: EditServiceDeps): EditService {
  const logger = deps.logger ?? console;
  const immutable = new Set<string>([...IDENTITY_FIELDS, ...deps.immutableFields]);
  const editable: ReadonlyArray<string> = deps.editableFields.filter((field, i, all) => !immutable.has(field) && all.indexOf(field) === i);

  if (editable.length === 0) {
    throw new Error("EditService requires at least one editable field that is not immutable.");
  }

  function isEditable(field: string): boolean {
    return editable.includes(field) && !immutable.has(field);
  }

  function expireStaleBinding(session: VerifiedSession): ResultErr {
    deps.sessions.logout(session.chatId);
    logger.warn(`[RegistrantDesk] Chat ${session.chatId} was bound to row ${session.recordIndex}, which changed; session ended.`);
    return err("SESSION_EXPIRED", "Your record changed since you verified. Verify again.");
  }

  // A reload may shrink or reorder the table; a binding whose row no longer carries the identity is stale.
  async function resolveBoundRecord(session: VerifiedSession): Promise<Result<RecordRow>> {
    const current = await deps.records.get(session.recordIndex);
    if (!current.ok || !sameIdentity(identityOf(current.value), session.identity)) {
      return expireStaleBinding(session);
    }
    return ok(current.value);
  }

  async function requireBoundSession(chatId: string): Promise<Result<Readonly<{ session: VerifiedSession; record: RecordRow }>>> {
    const active = deps.sessions.requireActive(chatId);
    if (!active.ok) return err(active.error.code, active.error.message, active.error.context);
    const record = await resolveBoundRecord(active.value);
    if (!record.ok) return record;
    return ok({ session: active.value, record: record.value });
  }

  return {
    async viewOwnRecord(chatId: string): Promise<Result<OwnRecordView>> {
      const bound = await requireBoundSession(chatId);
      if (!bound.ok) return bound;
      return ok({
        recordIndex: bound.value.session.recordIndex,
        record: bound.value.record,
        editableFields: editable,
        window: deps.window.status()
      });
    },

    async chooseField(chatId: string, field: string): Promise<Result<FieldChoice>> {
      const bound = await requireBoundSession(chatId);
      if (!bound.ok) return bound;
      const name = String(field ?? "").trim();
      if (!isEditable(name)) {
        return err("IMMUTABLE_FIELD", `"${name}" cannot be edited.`, { field: name, editableFields: editable });
      }
      if (!deps.window.isEditingAllowed()) {
        return err("WINDOW_CLOSED", "The editing window has closed.", { daysLeft: deps.window.status().daysLeft });
      }
      const pending = deps.sessions.setPendingField(chatId, name);
      if (!pending.ok) return err(pending.error.code, pending.error.message, pending.error.context);
      return ok({ field: name, state: "AwaitingValue" });
    },

    async submitValue(chatId: string, newValue: string): Promise<Result<AppliedEdit>> {
      const active = deps.sessions.requireActive(chatId);
      if (!active.ok) return err(active.error.code, active.error.message, active.error.context);
      const session = active.value;
      const field = session.pendingField;
      if (field === null) {
        return err("NO_PENDING_FIELD", "Choose a field to edit first.");
      }

      // Unusable input leaves the field pending so the user can resend.
      const value = String(newValue ?? "").trim();
      if (!value) {
        return err("INVALID_INPUT", "The new value cannot be empty.", { field });
      }
      if (value.length > MAX_VALUE_LENGTH) {
        return err("INVALID_INPUT", `The new value must be at most ${MAX_VALUE_LENGTH} characters.`, { field });
      }

      deps.sessions.clearPendingField(chatId);

      if (!isEditable(field)) {
        return err("IMMUTABLE_FIELD", `"${field}" cannot be edited.`, { field });
      }
      // Re-checked here: the window may have closed since the field was chosen.
      if (!deps.window.isEditingAllowed()) {
        return err("WINDOW_CLOSED", "The editing window has closed.", { daysLeft: deps.window.status().daysLeft });
      }

      const applied = await deps.records.applyEdit({
        index: session.recordIndex,
        field,
        value,
        identity: session.identity,
        reason: `edit_${session.chatId}_${field}`
      });
      if (!applied.ok) {
        if (applied.error.code === "INDEX_OUT_OF_RANGE" || applied.error.code === "STALE_RECORD") {
          return expireStaleBinding(session);
        }
        return err("IMMUTABLE_FIELD", `"${field}" cannot be edited.`, { field, cause: applied.error.code });
      }

      const { oldValue } = applied.value;
      if (!applied.value.persisted.ok) {
        return err("PERSIST_FAILED", "Your change was applied but could not be saved to disk.", {
          field,
          oldValue,
          newValue: value
        });
      }

      await deps.actionLog.recordAction(`Chat ${session.chatId} edited row ${session.recordIndex} field ${field}`);
      return ok({ field, oldValue, newValue: value });
    }
  };
}
