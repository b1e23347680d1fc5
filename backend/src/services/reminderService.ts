import type { ActionLog, Logger } from "./actionLog";
import type { AdminNotifier } from "./adminNotifier";
import type { EditWindowService, WindowStatus } from "./editWindowService";

export type ReminderKind = "three_days_left" | "one_day_left" | "closed";

export type ReminderService = Readonly<{
  start(): void;
  stop(): void;
  /** Sends the reminder due now, if any, and resolves to its kind. */
  check(): Promise<ReminderKind | null>;
}>;

export type ReminderServiceDeps = Readonly<{
  window: Pick<EditWindowService, "status">;
  notifier: AdminNotifier;
  intervalMs?: number;
  actionLog?: Pick<ActionLog, "recordAction" | "recordError">;
  logger?: Logger;
}>;

export const DEFAULT_REMINDER_INTERVAL_MS = 60 * 60 * 1000;

function dueReminder(status: WindowStatus): ReminderKind | null {
  if (status.readOnly) return null;
  if (status.daysSinceStart === status.windowDays + 1) return "closed";
  if (status.daysSinceStart > status.windowDays) return null;
  if (status.daysLeft === 3) return "three_days_left";
  if (status.daysLeft === 1) return "one_day_left";
  return null;
}

function describeReminder(kind: ReminderKind, status: WindowStatus): Readonly<{ subject: string; text: string }> {
  const opened = new Date(status.startMs).toISOString();
  if (kind === "closed") {
    return {
      subject: "Edit window closed",
      text: `The ${status.windowDays}-day edit window opened on ${opened} has closed. Records can no longer be edited.`
    };
  }
  const days = kind === "three_days_left" ? 3 : 1;
  return {
    subject: `Edit window: ${days} day${days === 1 ? "" : "s"} left`,
    text: `The edit window opened on ${opened} closes in ${days} day${days === 1 ? "" : "s"}.`
  };
}

export function createReminderService(deps: ReminderServiceDeps): ReminderService {
  const logger = deps.logger ?? console;
  const intervalMs = deps.intervalMs ?? DEFAULT_REMINDER_INTERVAL_MS;

  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new Error("ReminderService requires a positive intervalMs.");
  }

  // Keyed by window start, so resetting the window re-arms every reminder.
  const sent = new Set<string>();
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<ReminderKind | null> | null = null;

  async function runCheck(): Promise<ReminderKind | null> {
    const status = deps.window.status();
    const kind = dueReminder(status);
    if (!kind) return null;
    const key = `${status.startMs}:${kind}`;
    if (sent.has(key)) return null;

    const { subject, text } = describeReminder(kind, status);
    try {
      await deps.notifier.notify(subject, text);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`[RegistrantDesk] Failed to send admin reminder "${subject}": ${message}`);
      if (deps.actionLog) await deps.actionLog.recordError(`Failed to send admin reminder "${subject}": ${message}`);
      return null;
    }
    sent.add(key);
    if (deps.actionLog) await deps.actionLog.recordAction(`Admin reminder sent: ${subject}`);
    return kind;
  }

  function check(): Promise<ReminderKind | null> {
    if (inFlight) return inFlight;
    inFlight = runCheck().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  return {
    start(): void {
      if (timer) return;
      timer = setInterval(() => {
        void check();
      }, intervalMs);
    },

    stop(): void {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    check
  };
}
