import { createInMemorySessionRepository } from "../backend/src/repositories/inMemoryStateRepositories";
import { createSessionService, type Session } from "../backend/src/services/sessionService";
import { createCapturingLogger, createClock } from "./testSupport";

const T = Date.UTC(2024, 2, 1, 12, 0, 0);
const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;
const ADA = { email: "ada@example.com", phone: "08010000001" };

describe("sessionService", () => {
  it("Given a non-positive TTL When createSessionService is called Then it throws", () => {
    expect(() => createSessionService({ repository: createInMemorySessionRepository(), sessionTtlMs: 0 })).toThrow(
      "SessionService requires a positive sessionTtlMs."
    );
  });

  it("Given a session verified at T When checked at T+23h59m and T+24h01m Then it is active and then expired", () => {
    const clock = createClock(T);
    const repository = createInMemorySessionRepository();
    const sessions = createSessionService({ repository, nowMs: clock.now, logger: createCapturingLogger() });

    const verified = sessions.verify("chat-1", 0, ADA);
    expect(verified.expiresAtMs).toBe(T + 24 * HOUR);

    clock.set(T + 23 * HOUR + 59 * MINUTE);
    expect(sessions.isActive("chat-1")).toBe(true);

    clock.set(T + 24 * HOUR + 1 * MINUTE);
    expect(sessions.requireActive("chat-1")).toEqual({
      ok: false,
      error: { code: "SESSION_EXPIRED", message: "Your session has expired. Verify again.", context: { expiresAtMs: T + 24 * HOUR } }
    });
    // Expired sessions are removed on first contact.
    expect(sessions.get("chat-1")).toBeNull();
    expect(repository.saved()).toEqual([]);
  });

  it("Given a session exactly at its expiry instant When checked Then it is expired", () => {
    const clock = createClock(T);
    const sessions = createSessionService({ repository: createInMemorySessionRepository(), nowMs: clock.now, sessionTtlMs: HOUR });
    sessions.verify("chat-1", 0, ADA);
    clock.set(T + HOUR);
    expect(sessions.isActive("chat-1")).toBe(false);
  });

  it("Given an unverified chat When requireActive is called Then it returns NOT_VERIFIED", () => {
    const sessions = createSessionService({ repository: createInMemorySessionRepository(), nowMs: () => T });
    sessions.startUnverified("chat-2");
    expect(sessions.requireActive("chat-2")).toEqual({
      ok: false,
      error: { code: "NOT_VERIFIED", message: "Verify your email and phone first." }
    });
    expect(sessions.requireActive("chat-unknown")).toEqual({
      ok: false,
      error: { code: "NOT_VERIFIED", message: "Verify your email and phone first." }
    });
  });

  it("Given a pending field When a fresh verification happens Then the pending field is cleared", () => {
    const sessions = createSessionService({ repository: createInMemorySessionRepository(), nowMs: () => T });
    sessions.verify("chat-1", 0, ADA);
    const pending = sessions.setPendingField("chat-1", "FullName");
    if (!pending.ok) throw new Error("unreachable");
    expect(pending.value.pendingField).toBe("FullName");

    const again = sessions.verify("chat-1", 0, ADA);
    expect(again.pendingField).toBeNull();
  });

  it("Given no pending field When clearPendingField is called Then nothing is persisted", () => {
    const repository = createInMemorySessionRepository();
    const sessions = createSessionService({ repository, nowMs: () => T });
    sessions.verify("chat-1", 0, ADA);
    const saves = repository.saveCount();
    sessions.clearPendingField("chat-1");
    expect(repository.saveCount()).toBe(saves);
  });

  it("Given sessions When logging out Then only an existing session reports true", () => {
    const sessions = createSessionService({ repository: createInMemorySessionRepository(), nowMs: () => T });
    sessions.verify("chat-1", 0, ADA);
    expect(sessions.logout("chat-1")).toBe(true);
    expect(sessions.logout("chat-1")).toBe(false);
    expect(sessions.get("chat-1")).toBeNull();
  });

  it("Given stored sessions When the service starts Then they are restored and listActive drops the expired ones", () => {
    const stored: Session[] = [
      { chatId: "live", verified: true, recordIndex: 1, identity: ADA, verifiedAtMs: T - HOUR, expiresAtMs: T + HOUR, pendingField: null },
      { chatId: "old", verified: true, recordIndex: 2, identity: ADA, verifiedAtMs: T - 30 * HOUR, expiresAtMs: T - 6 * HOUR, pendingField: null },
      { chatId: "new", verified: false }
    ];
    const repository = createInMemorySessionRepository(stored);
    const sessions = createSessionService({ repository, nowMs: () => T });

    expect(sessions.listActive().map((s) => s.chatId)).toEqual(["live"]);
    expect(repository.saved().map((s) => s.chatId)).toEqual(["live", "new"]);
  });

  it("Given a repository that fails When sessions change Then the failure is logged and state stays in memory", () => {
    const logger = createCapturingLogger();
    const sessions = createSessionService({
      repository: {
        loadSessions() {
          throw new Error("unreadable");
        },
        saveSessions() {
          throw new Error("disk full");
        }
      },
      nowMs: () => T,
      logger
    });

    sessions.verify("chat-1", 3, ADA);
    expect(sessions.isActive("chat-1")).toBe(true);
    expect(logger.lines).toEqual([
      { level: "error", text: "[RegistrantDesk] Failed to load sessions; starting empty: unreadable" },
      { level: "error", text: "[RegistrantDesk] Failed to persist sessions: disk full" }
    ]);
  });

  it("Given an invalid record index or blank chat When verifying Then it throws", () => {
    const sessions = createSessionService({ repository: createInMemorySessionRepository(), nowMs: () => T });
    expect(() => sessions.verify("chat-1", -1, ADA)).toThrow("SessionService.verify requires a non-negative integer recordIndex.");
    expect(() => sessions.verify("  ", 0, ADA)).toThrow("SessionService requires a non-empty chatId.");
  });
});
