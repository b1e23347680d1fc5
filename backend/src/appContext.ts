import type { Settings } from "./config";
import { createFileEditWindowRepository } from "./repositories/fileEditWindowRepository";
import { createFileSessionRepository } from "./repositories/fileSessionRepository";
import { createAccessTokenService, type AccessTokenService } from "./services/accessTokenService";
import { createActionLog, type ActionLog, type Logger } from "./services/actionLog";
import { createAdminService, type AdminService, type MessageSender } from "./services/adminService";
import { createConsoleNotifier, createEmailNotifier, type AdminNotifier } from "./services/adminNotifier";
import { createEditService, type EditService } from "./services/editService";
import { createEditWindowService, type EditWindowService } from "./services/editWindowService";
import { createFileWatcher, type FileWatcher } from "./services/fileWatcher";
import { createRecordStore, type RecordStore, type TableFileSystem } from "./services/recordStore";
import { createReminderService, type ReminderService } from "./services/reminderService";
import { createSessionService, type SessionService } from "./services/sessionService";
import { createVerificationService, type VerificationService } from "./services/verificationService";

export type AppContext = Readonly<{
  settings: Settings;
  actionLog: ActionLog;
  records: RecordStore;
  sessions: SessionService;
  window: EditWindowService;
  verification: VerificationService;
  edits: EditService;
  admin: AdminService;
  accessTokens: AccessTokenService;
  watcher: FileWatcher;
  reminders: ReminderService;
}>;

export type AppContextOptions = Readonly<{
  sender: MessageSender;
  notifier?: AdminNotifier;
  fileSystem?: TableFileSystem;
  nowMs?: () => number;
  logger?: Logger;
}>;

/** Builds every component once; nothing is loaded or started until the caller does so. */
export function createAppContext(settings: Settings, options: AppContextOptions): AppContext {
  const logger = options.logger ?? console;
  const nowMs = options.nowMs ?? (() => Date.now());

  const actionLog = createActionLog({ logDir: settings.logDir, nowMs, logger });
  const records = createRecordStore({
    csvPath: settings.csvPath,
    backupDir: settings.backupDir,
    requiredColumns: [...settings.immutableFields, ...settings.editableFields],
    actionLog,
    backupRetention: settings.backupRetention,
    fileSystem: options.fileSystem,
    nowMs,
    logger
  });
  const sessions = createSessionService({
    repository: createFileSessionRepository(settings.sessionsPath),
    nowMs,
    sessionTtlMs: settings.sessionTtlMs,
    logger
  });
  const window = createEditWindowService({
    repository: createFileEditWindowRepository(settings.windowPath),
    nowMs,
    windowDays: settings.windowDays,
    readOnly: settings.readOnly,
    startMsOverride: settings.startMsOverride ?? undefined,
    logger
  });

  const notifier =
    options.notifier ??
    (settings.smtp ? createEmailNotifier({ smtp: settings.smtp, recipients: settings.adminEmails, logger }) : createConsoleNotifier(logger));

  return {
    settings,
    actionLog,
    records,
    sessions,
    window,
    verification: createVerificationService({ records, sessions, actionLog, logger }),
    edits: createEditService({
      records,
      sessions,
      window,
      editableFields: settings.editableFields,
      immutableFields: settings.immutableFields,
      actionLog,
      logger
    }),
    admin: createAdminService({ records, window, sessions, sender: options.sender, actionLog, logger }),
    accessTokens: createAccessTokenService({ secret: settings.jwtSecret, nowMs }),
    watcher: createFileWatcher({ store: records, intervalMs: settings.pollIntervalMs, actionLog, logger }),
    reminders: createReminderService({ window, notifier, intervalMs: settings.reminderIntervalMs, actionLog, logger })
  };
}
