import type { ActionLog, Logger } from "./actionLog";
import type { RecordStore } from "./recordStore";
import { normalizeIdentity } from "./recordStore";
import type { SessionService, VerifiedSession } from "./sessionService";

export type ErrorCode = "NOT_FOUND" | "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type VerifiedResult = Readonly<{
  recordIndex: number;
  expiresAtMs: number;
}>;

export type VerificationService = Readonly<{
  begin(chatId: string): void;
  verify(chatId: string, claimedEmail: string, claimedPhone: string): Promise<Result<VerifiedResult>>;
}>;

export type VerificationServiceDeps = Readonly<{
  records: Pick<RecordStore, "findByIdentity">;
  sessions: Pick<SessionService, "get" | "startUnverified" | "verify">;
  actionLog: ActionLog;
  logger?: Logger;
}>;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function createVerificationService(deps: VerificationServiceDeps): VerificationService {
  const logger = deps.logger ?? console;

  // A failed attempt leaves an existing session unverified; a chat never seen before gets none.
  function demote(chatId: string): void {
    if (deps.sessions.get(chatId)) deps.sessions.startUnverified(chatId);
  }

  return {
    begin(chatId: string): void {
      deps.sessions.startUnverified(chatId);
    },

    async verify(chatId: string, claimedEmail: string, claimedPhone: string): Promise<Result<VerifiedResult>> {
      const claim = normalizeIdentity(claimedEmail, claimedPhone);
      if (!claim.email || !claim.phone) {
        demote(chatId);
        return err("INVALID_INPUT", "Both email and phone are required.");
      }

      const match = await deps.records.findByIdentity(claim.email, claim.phone);
      if (!match.ok) {
        demote(chatId);
        logger.log(`[RegistrantDesk] Verification failed for chat ${chatId}.`);
        return err("NOT_FOUND", "No record matches that email and phone.");
      }

      const session: VerifiedSession = deps.sessions.verify(chatId, match.value.index, claim);
      await deps.actionLog.recordAction(`Chat ${session.chatId} verified for row ${match.value.index}`);
      return ok({ recordIndex: match.value.index, expiresAtMs: session.expiresAtMs });
    }
  };
}
