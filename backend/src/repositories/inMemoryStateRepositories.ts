import type { EditWindowRepository } from "../services/editWindowService";
import type { Session, SessionRepository } from "../services/sessionService";

export type InMemorySessionRepository = SessionRepository &
  Readonly<{
    saved(): ReadonlyArray<Session>;
    saveCount(): number;
  }>;

export type InMemoryEditWindowRepository = EditWindowRepository &
  Readonly<{
    saved(): number | null;
  }>;

export function createInMemorySessionRepository(initial: ReadonlyArray<Session> = []): InMemorySessionRepository {
  let stored: ReadonlyArray<Session> = [...initial];
  let saves = 0;

  return {
    loadSessions(): ReadonlyArray<Session> {
      return stored;
    },

    saveSessions(sessions: ReadonlyArray<Session>): void {
      stored = [...sessions];
      saves += 1;
    },

    saved(): ReadonlyArray<Session> {
      return stored;
    },

    saveCount(): number {
      return saves;
    }
  };
}

export function createInMemoryEditWindowRepository(initialStartMs: number | null = null): InMemoryEditWindowRepository {
  let stored = initialStartMs;

  return {
    loadStartMs(): number | null {
      return stored;
    },

    saveStartMs(startMs: number): void {
      stored = startMs;
    },

    saved(): number | null {
      return stored;
    }
  };
}
