import nodemailer from "nodemailer";

import type { Logger } from "./actionLog";

export type AdminNotifier = Readonly<{
  notify(subject: string, text: string): Promise<void>;
}>;

export type SmtpSettings = Readonly<{
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  from: string;
}>;

export type MailTransport = Readonly<{
  sendMail(message: Readonly<{ from: string; to: string; subject: string; text: string }>): Promise<unknown>;
}>;

export function createConsoleNotifier(logger: Logger = console): AdminNotifier {
  return {
    async notify(subject: string, text: string): Promise<void> {
      logger.log(`[RegistrantDesk] Admin notice: ${subject}: ${text}`);
    }
  };
}

export function createEmailNotifier(
  deps: Readonly<{ smtp: SmtpSettings; recipients: ReadonlyArray<string>; transport?: MailTransport; logger?: Logger }>
): AdminNotifier {
  const logger = deps.logger ?? console;
  const recipients = deps.recipients.map((r) => r.trim()).filter((r) => r !== "");
  if (recipients.length === 0) {
    throw new Error("Email notifier requires at least one recipient.");
  }
  const transport: MailTransport =
    deps.transport ??
    nodemailer.createTransport({
      host: deps.smtp.host,
      port: deps.smtp.port,
      secure: deps.smtp.secure,
      auth: {
        user: deps.smtp.user,
        pass: deps.smtp.pass
      }
    });

  return {
    async notify(subject: string, text: string): Promise<void> {
      await transport.sendMail({ from: deps.smtp.from, to: recipients.join(", "), subject, text });
      logger.log(`[RegistrantDesk] Admin notice sent to ${recipients.length} recipient(s): ${subject}`);
    }
  };
}
