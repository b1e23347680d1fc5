import { createInMemoryEditWindowRepository } from "../backend/src/repositories/inMemoryStateRepositories";
import { createConsoleNotifier, createEmailNotifier, type AdminNotifier } from "../backend/src/services/adminNotifier";
import { DAY_MS, createEditWindowService } from "../backend/src/services/editWindowService";
import { createReminderService } from "../backend/src/services/reminderService";
import { createCapturingLogger, createClock } from "./testSupport";

const D = Date.UTC(2024, 4, 1, 8, 0, 0);

function recordingNotifier(): AdminNotifier & { sent: Array<{ subject: string; text: string }> } {
  const sent: Array<{ subject: string; text: string }> = [];
  return {
    sent,
    async notify(subject: string, text: string) {
      sent.push({ subject, text });
    }
  };
}

function setup(readOnly = false) {
  const clock = createClock(D);
  const window = createEditWindowService({ repository: createInMemoryEditWindowRepository(D), nowMs: clock.now, readOnly });
  const notifier = recordingNotifier();
  const logger = createCapturingLogger();
  const reminders = createReminderService({ window, notifier, intervalMs: 60_000, logger });
  return { clock, window, notifier, logger, reminders };
}

describe("reminderService", () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it("Given a seven day window When days pass Then admins hear once at three days, once at one day and once at closure", async () => {
    const { clock, notifier, reminders } = setup();

    expect(await reminders.check()).toBeNull();

    clock.set(D + 4 * DAY_MS);
    expect(await reminders.check()).toBe("three_days_left");
    expect(await reminders.check()).toBeNull();

    clock.set(D + 6 * DAY_MS);
    expect(await reminders.check()).toBe("one_day_left");

    clock.set(D + 7 * DAY_MS);
    expect(await reminders.check()).toBe("closed");

    clock.set(D + 8 * DAY_MS);
    expect(await reminders.check()).toBeNull();

    expect(notifier.sent).toEqual([
      { subject: "Edit window: 3 days left", text: "The edit window opened on 2024-05-01T08:00:00.000Z closes in 3 days." },
      { subject: "Edit window: 1 day left", text: "The edit window opened on 2024-05-01T08:00:00.000Z closes in 1 day." },
      {
        subject: "Edit window closed",
        text: "The 7-day edit window opened on 2024-05-01T08:00:00.000Z has closed. Records can no longer be edited."
      }
    ]);
  });

  it("Given a window that is reopened When the same day count recurs Then the reminder is sent again", async () => {
    const { clock, window, notifier, reminders } = setup();
    clock.set(D + 4 * DAY_MS);
    await reminders.check();

    window.openWindow();
    clock.advance(4 * DAY_MS);
    expect(await reminders.check()).toBe("three_days_left");
    expect(notifier.sent).toHaveLength(2);
  });

  it("Given read-only mode When a reminder day arrives Then nothing is sent", async () => {
    const { clock, notifier, reminders } = setup(true);
    clock.set(D + 4 * DAY_MS);
    expect(await reminders.check()).toBeNull();
    expect(notifier.sent).toEqual([]);
  });

  it("Given a notifier that fails When checking Then the failure is logged and the reminder is retried later", async () => {
    const clock = createClock(D + 6 * DAY_MS);
    const window = createEditWindowService({ repository: createInMemoryEditWindowRepository(D), nowMs: clock.now });
    const logger = createCapturingLogger();
    let failures = 1;
    const reminders = createReminderService({
      window,
      notifier: {
        async notify() {
          if (failures > 0) {
            failures -= 1;
            throw new Error("SMTP unavailable");
          }
        }
      },
      logger
    });

    expect(await reminders.check()).toBeNull();
    expect(logger.lines).toEqual([
      { level: "error", text: '[RegistrantDesk] Failed to send admin reminder "Edit window: 1 day left": SMTP unavailable' }
    ]);
    expect(await reminders.check()).toBe("one_day_left");
  });

  it("Given a started service When the interval elapses Then it checks on its own until stopped", async () => {
    jest.useFakeTimers();
    const { clock, notifier, reminders } = setup();
    clock.set(D + 4 * DAY_MS);

    reminders.start();
    await jest.advanceTimersByTimeAsync(60_000);
    expect(notifier.sent).toHaveLength(1);

    reminders.stop();
    clock.set(D + 6 * DAY_MS);
    await jest.advanceTimersByTimeAsync(120_000);
    expect(notifier.sent).toHaveLength(1);
  });
});

describe("adminNotifier", () => {
  it("Given no SMTP When notifying Then the notice is written to the log", async () => {
    const logger = createCapturingLogger();
    await createConsoleNotifier(logger).notify("Edit window closed", "Done.");
    expect(logger.lines).toEqual([{ level: "log", text: "[RegistrantDesk] Admin notice: Edit window closed: Done." }]);
  });

  it("Given SMTP settings When notifying Then one mail goes to all admins", async () => {
    const mails: unknown[] = [];
    const notifier = createEmailNotifier({
      smtp: { host: "smtp.test", port: 587, secure: false, user: "mailer", pass: "test-secret", from: "desk@example.com" },
      recipients: ["one@example.com", " two@example.com "],
      transport: {
        async sendMail(message) {
          mails.push(message);
          return { accepted: 2 };
        }
      },
      logger: createCapturingLogger()
    });

    await notifier.notify("Edit window: 1 day left", "Soon.");
    expect(mails).toEqual([
      { from: "desk@example.com", to: "one@example.com, two@example.com", subject: "Edit window: 1 day left", text: "Soon." }
    ]);
  });

  it("Given no recipients When creating the email notifier Then it throws", () => {
    expect(() =>
      createEmailNotifier({
        smtp: { host: "smtp.test", port: 587, secure: false, user: "mailer", pass: "test-secret", from: "desk@example.com" },
        recipients: [" "]
      })
    ).toThrow("Email notifier requires at least one recipient.");
  });
});
