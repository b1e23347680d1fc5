import type { Logger } from "./actionLog";
import type { Identity } from "./recordStore";

export type ErrorCode = "NOT_VERIFIED" | "SESSION_EXPIRED";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type UnverifiedSession = Readonly<{
  chatId: string;
  verified: false;
}>;

export type VerifiedSession = Readonly<{
  chatId: string;
  verified: true;
  recordIndex: number;
  identity: Identity;
  verifiedAtMs: number;
  expiresAtMs: number;
  pendingField: string | null;
}>;

export type Session = UnverifiedSession | VerifiedSession;

export type SessionRepository = Readonly<{
  loadSessions(): ReadonlyArray<Session>;
  saveSessions(sessions: ReadonlyArray<Session>): void;
}>;

export type SessionService = Readonly<{
  get(chatId: string): Session | null;
  startUnverified(chatId: string): UnverifiedSession;
  verify(chatId: string, recordIndex: number, identity: Identity): VerifiedSession;
  isActive(chatId: string): boolean;
  requireActive(chatId: string): Result<VerifiedSession>;
  setPendingField(chatId: string, field: string): Result<VerifiedSession>;
  clearPendingField(chatId: string): void;
  logout(chatId: string): boolean;
  listActive(): ReadonlyArray<VerifiedSession>;
}>;

export type SessionServiceDeps = Readonly<{
  repository: SessionRepository;
  nowMs?: () => number;
  sessionTtlMs?: number;
  logger?: Logger;
}>;

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function normalizeChatId(chatId: string): string {
  const value = String(chatId ?? "").trim();
  if (!value) {
    throw new Error("SessionService requires a non-empty chatId.");
  }
  return value;
}

// Methods are synchronous, so each runs to completion on the event loop; that is the session map's exclusion boundary.
export function createSessionService(deps: SessionServiceDeps): SessionService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const sessionTtlMs = deps.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
  const logger = deps.logger ?? console;
  const repository = deps.repository;

  if (!Number.isFinite(sessionTtlMs) || sessionTtlMs <= 0) {
    throw new Error("SessionService requires a positive sessionTtlMs.");
  }

  const sessionsByChatId = new Map<string, Session>();

  try {
    for (const session of repository.loadSessions()) {
      sessionsByChatId.set(session.chatId, session);
    }
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    logger.error(`[RegistrantDesk] Failed to load sessions; starting empty: ${message}`);
  }

  function persist(): void {
    try {
      repository.saveSessions(Array.from(sessionsByChatId.values()));
    } catch (e: unknown) {
      // Durability is best-effort; in-memory state stays authoritative for this process.
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[RegistrantDesk] Failed to persist sessions: ${message}`);
    }
  }

  function isExpired(session: VerifiedSession): boolean {
    return nowMs() >= session.expiresAtMs;
  }

  function resolveActive(chatId: string): Result<VerifiedSession> {
    const session = sessionsByChatId.get(chatId);
    if (!session || !session.verified) {
      return err("NOT_VERIFIED", "Verify your email and phone first.");
    }
    if (isExpired(session)) {
      sessionsByChatId.delete(chatId);
      persist();
      return err("SESSION_EXPIRED", "Your session has expired. Verify again.", { expiresAtMs: session.expiresAtMs });
    }
    return ok(session);
  }

  return {
    get(chatId: string): Session | null {
      return sessionsByChatId.get(normalizeChatId(chatId)) ?? null;
    },

    startUnverified(chatId: string): UnverifiedSession {
      const id = normalizeChatId(chatId);
      const session: UnverifiedSession = { chatId: id, verified: false };
      sessionsByChatId.set(id, session);
      persist();
      return session;
    },

    verify(chatId: string, recordIndex: number, identity: Identity): VerifiedSession {
      const id = normalizeChatId(chatId);
      if (!Number.isInteger(recordIndex) || recordIndex < 0) {
        throw new Error("SessionService.verify requires a non-negative integer recordIndex.");
      }
      const now = nowMs();
      const session: VerifiedSession = {
        chatId: id,
        verified: true,
        recordIndex,
        identity: { email: identity.email, phone: identity.phone },
        verifiedAtMs: now,
        expiresAtMs: now + sessionTtlMs,
        pendingField: null
      };
      sessionsByChatId.set(id, session);
      persist();
      return session;
    },

    isActive(chatId: string): boolean {
      return resolveActive(normalizeChatId(chatId)).ok;
    },

    requireActive(chatId: string): Result<VerifiedSession> {
      return resolveActive(normalizeChatId(chatId));
    },

    setPendingField(chatId: string, field: string): Result<VerifiedSession> {
      const active = resolveActive(normalizeChatId(chatId));
      if (!active.ok) return active;
      const updated: VerifiedSession = { ...active.value, pendingField: field };
      sessionsByChatId.set(updated.chatId, updated);
      persist();
      return ok(updated);
    },

    clearPendingField(chatId: string): void {
      const id = normalizeChatId(chatId);
      const session = sessionsByChatId.get(id);
      if (!session || !session.verified || session.pendingField === null) return;
      sessionsByChatId.set(id, { ...session, pendingField: null });
      persist();
    },

    logout(chatId: string): boolean {
      const id = normalizeChatId(chatId);
      const existed = sessionsByChatId.delete(id);
      if (existed) persist();
      return existed;
    },

    listActive(): ReadonlyArray<VerifiedSession> {
      const active: VerifiedSession[] = [];
      let expired = 0;
      for (const session of Array.from(sessionsByChatId.values())) {
        if (!session.verified) continue;
        if (isExpired(session)) {
          sessionsByChatId.delete(session.chatId);
          expired += 1;
          continue;
        }
        active.push(session);
      }
      if (expired > 0) persist();
      return active;
    }
  };
}
