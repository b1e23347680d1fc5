import path from "node:path";

import { DEFAULT_EDITABLE_FIELDS, DEFAULT_IMMUTABLE_FIELDS, resolveSettingsFromEnv } from "../backend/src/config";

const CWD = path.resolve("/srv/desk");

describe("config", () => {
  it("Given only a JWT secret When settings are resolved Then defaults apply", () => {
    const settings = resolveSettingsFromEnv({ JWT_SECRET: "test_secret" }, CWD);
    const dataDir = path.join(CWD, "backend", ".data");
    expect(settings).toEqual({
      port: 3000,
      jwtSecret: "test_secret",
      dataDir,
      csvPath: path.join(dataDir, "registrants.csv"),
      sessionsPath: path.join(dataDir, "sessions.json"),
      windowPath: path.join(dataDir, "window.json"),
      logDir: path.join(dataDir, "logs"),
      backupDir: path.join(dataDir, "backups"),
      editableFields: DEFAULT_EDITABLE_FIELDS,
      immutableFields: DEFAULT_IMMUTABLE_FIELDS,
      pollIntervalMs: 8000,
      sessionTtlMs: 24 * 60 * 60 * 1000,
      windowDays: 7,
      backupRetention: 100,
      startMsOverride: null,
      readOnly: false,
      reminderIntervalMs: 60 * 60 * 1000,
      adminEmails: [],
      smtp: null
    });
  });

  it("Given no JWT secret When settings are resolved Then it throws", () => {
    expect(() => resolveSettingsFromEnv({}, CWD)).toThrow("Missing JWT_SECRET environment variable.");
  });

  it("Given explicit values When settings are resolved Then they override the defaults", () => {
    const settings = resolveSettingsFromEnv(
      {
        JWT_SECRET: "test_secret",
        PORT: "8080",
        DATA_DIR: "/var/desk",
        CSV_PATH: "people.csv",
        EDITABLE_FIELDS: "FullName, BankName,FullName",
        IMMUTABLE_FIELDS: "Email,Phone",
        CSV_POLL_INTERVAL_SECONDS: "2.5",
        SESSION_TTL_HOURS: "12",
        EDIT_WINDOW_DAYS: "10",
        BACKUP_RETENTION: "5",
        START_DATE: "2024-05-01",
        READ_ONLY: "yes",
        REMINDER_INTERVAL_MINUTES: "15",
        ADMIN_EMAILS: "a@example.com, b@example.com",
        SMTP_HOST: "smtp.test",
        SMTP_USER: "mailer",
        SMTP_PASS: "test-secret",
        SMTP_FROM: "desk@example.com",
        SMTP_SECURE: "true"
      },
      CWD
    );

    expect(settings.port).toBe(8080);
    expect(settings.csvPath).toBe(path.resolve("/var/desk", "people.csv"));
    expect(settings.editableFields).toEqual(["FullName", "BankName"]);
    expect(settings.immutableFields).toEqual(["Email", "Phone"]);
    expect(settings.pollIntervalMs).toBe(2500);
    expect(settings.sessionTtlMs).toBe(12 * 60 * 60 * 1000);
    expect(settings.windowDays).toBe(10);
    expect(settings.backupRetention).toBe(5);
    expect(settings.startMsOverride).toBe(Date.UTC(2024, 4, 1));
    expect(settings.readOnly).toBe(true);
    expect(settings.reminderIntervalMs).toBe(15 * 60 * 1000);
    expect(settings.adminEmails).toEqual(["a@example.com", "b@example.com"]);
    expect(settings.smtp).toEqual({
      host: "smtp.test",
      port: 587,
      secure: true,
      user: "mailer",
      pass: "test-secret",
      from: "desk@example.com"
    });
  });

  it.each([
    [{ EDIT_WINDOW_DAYS: "1.5" }, 'EDIT_WINDOW_DAYS must be a positive integer, got "1.5".'],
    [{ SESSION_TTL_HOURS: "-1" }, 'SESSION_TTL_HOURS must be a positive number, got "-1".'],
    [{ START_DATE: "someday" }, 'START_DATE must be an ISO date or timestamp, got "someday".'],
    [{ EDITABLE_FIELDS: "Email,FullName" }, "Fields cannot be both editable and immutable: Email."],
    [{ SMTP_HOST: "smtp.test" }, "SMTP is partially configured; SMTP_HOST, SMTP_USER, SMTP_PASS and SMTP_FROM are all required."],
    [
      { SMTP_HOST: "smtp.test", SMTP_USER: "mailer", SMTP_PASS: "test-secret", SMTP_FROM: "desk@example.com" },
      "ADMIN_EMAILS is required when SMTP is configured."
    ]
  ])("Given invalid env %p When settings are resolved Then it throws", (env, message) => {
    expect(() => resolveSettingsFromEnv({ JWT_SECRET: "test_secret", ...env }, CWD)).toThrow(message);
  });
});
