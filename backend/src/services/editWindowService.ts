import type { Logger } from "./actionLog";

export type ErrorCode = "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type EditWindowRepository = Readonly<{
  loadStartMs(): number | null;
  saveStartMs(startMs: number): void;
}>;

export type WindowStatus = Readonly<{
  startMs: number;
  windowDays: number;
  daysSinceStart: number;
  daysLeft: number;
  editingAllowed: boolean;
  readOnly: boolean;
}>;

export type WindowChange = WindowStatus &
  Readonly<{
    persisted: boolean;
  }>;

export type EditWindowService = Readonly<{
  daysSinceStart(): number;
  daysLeft(): number;
  isEditingAllowed(): boolean;
  status(): WindowStatus;
  resetWindow(newStartMs: number): Result<WindowChange>;
  openWindow(): WindowChange;
  disableWindow(): WindowChange;
}>;

export type EditWindowServiceDeps = Readonly<{
  repository: EditWindowRepository;
  nowMs?: () => number;
  windowDays?: number;
  readOnly?: boolean;
  startMsOverride?: number;
  logger?: Logger;
}>;

export const DEFAULT_WINDOW_DAYS = 7;
export const DAY_MS = 24 * 60 * 60 * 1000;
const DISABLE_OFFSET_DAYS = 1000;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function createEditWindowService(deps: EditWindowServiceDeps): EditWindowService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const windowDays = deps.windowDays ?? DEFAULT_WINDOW_DAYS;
  const readOnly = deps.readOnly === true;
  const logger = deps.logger ?? console;
  const repository = deps.repository;

  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new Error("EditWindowService requires a positive integer windowDays.");
  }
  if (deps.startMsOverride !== undefined && !Number.isFinite(deps.startMsOverride)) {
    throw new Error("EditWindowService requires a finite startMsOverride.");
  }

  function save(startMs: number): boolean {
    try {
      repository.saveStartMs(startMs);
      return true;
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[RegistrantDesk] Failed to persist edit window start: ${message}`);
      return false;
    }
  }

  function initialStartMs(): number {
    if (deps.startMsOverride !== undefined) return deps.startMsOverride;
    try {
      const stored = repository.loadStartMs();
      if (stored !== null) return stored;
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[RegistrantDesk] Failed to read edit window start; starting a new window: ${message}`);
    }
    const now = nowMs();
    save(now);
    return now;
  }

  let startMs = initialStartMs();

  // Day 1 is the start day, so a window of N days closes at the start of day N + 1.
  function daysSinceStart(): number {
    return Math.floor((nowMs() - startMs) / DAY_MS) + 1;
  }

  function daysLeft(): number {
    return Math.max(0, windowDays - (daysSinceStart() - 1));
  }

  function isEditingAllowed(): boolean {
    if (readOnly) return false;
    return daysSinceStart() <= windowDays;
  }

  function status(): WindowStatus {
    return {
      startMs,
      windowDays,
      daysSinceStart: daysSinceStart(),
      daysLeft: daysLeft(),
      editingAllowed: isEditingAllowed(),
      readOnly
    };
  }

  function applyStart(newStartMs: number): WindowChange {
    startMs = newStartMs;
    const persisted = save(newStartMs);
    return { ...status(), persisted };
  }

  return {
    daysSinceStart,
    daysLeft,
    isEditingAllowed,
    status,

    resetWindow(newStartMs: number): Result<WindowChange> {
      if (!Number.isFinite(newStartMs)) {
        return err("INVALID_INPUT", "Window start must be a valid timestamp.");
      }
      if (newStartMs > nowMs()) {
        return err("INVALID_INPUT", "Window start cannot be in the future.", { startMs: newStartMs });
      }
      return ok(applyStart(newStartMs));
    },

    openWindow(): WindowChange {
      return applyStart(nowMs());
    },

    disableWindow(): WindowChange {
      return applyStart(nowMs() - DISABLE_OFFSET_DAYS * DAY_MS);
    }
  };
}
