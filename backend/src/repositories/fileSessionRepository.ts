import type { Session, SessionRepository } from "../services/sessionService";
import { isRecord, readJsonStateFile, writeJsonStateFile } from "./jsonStateFile";

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

// Anything short of a complete verified entry is dropped rather than trusted.
export function parseStoredSession(value: unknown): Session | null {
  if (!isRecord(value)) return null;
  const chatId = value.chatId;
  if (!isNonEmptyString(chatId)) return null;
  if (value.verified === false) {
    return { chatId, verified: false };
  }
  if (value.verified !== true) return null;

  const { recordIndex, email, phone, verifiedAtMs, expiresAtMs, pendingField } = value;
  if (typeof recordIndex !== "number" || !Number.isInteger(recordIndex) || recordIndex < 0) return null;
  if (!isNonEmptyString(email) || !isNonEmptyString(phone)) return null;
  if (typeof verifiedAtMs !== "number" || !Number.isFinite(verifiedAtMs)) return null;
  if (typeof expiresAtMs !== "number" || !Number.isFinite(expiresAtMs)) return null;
  if (!(pendingField === undefined || pendingField === null || typeof pendingField === "string")) return null;

  return {
    chatId,
    verified: true,
    recordIndex,
    identity: { email, phone },
    verifiedAtMs,
    expiresAtMs,
    pendingField: typeof pendingField === "string" ? pendingField : null
  };
}

export function serializeSession(session: Session): Record<string, unknown> {
  if (!session.verified) {
    return { chatId: session.chatId, verified: false };
  }
  return {
    chatId: session.chatId,
    verified: true,
    recordIndex: session.recordIndex,
    email: session.identity.email,
    phone: session.identity.phone,
    verifiedAtMs: session.verifiedAtMs,
    expiresAtMs: session.expiresAtMs,
    pendingField: session.pendingField
  };
}

export function createFileSessionRepository(filePath: string): SessionRepository {
  return {
    loadSessions(): ReadonlyArray<Session> {
      const parsed = readJsonStateFile(filePath);
      if (parsed === null) return [];
      if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.sessions)) {
        throw new Error("Invalid session store format.");
      }
      const sessions: Session[] = [];
      for (const candidate of parsed.sessions) {
        const session = parseStoredSession(candidate);
        if (session) sessions.push(session);
      }
      return sessions;
    },

    saveSessions(sessions: ReadonlyArray<Session>): void {
      writeJsonStateFile(filePath, { version: 1, sessions: sessions.map(serializeSession) });
    }
  };
}
