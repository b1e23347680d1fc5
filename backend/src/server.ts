import http from "node:http";

import express, { type NextFunction, type Request, type Response } from "express";
import { WebSocketServer } from "ws";

import { createAppContext, type AppContext } from "./appContext";
import { resolveSettingsFromEnv, type Settings } from "./config";
import { createWebsocketGateway, type ServiceError as WsError, type WebsocketGateway } from "./realtime/websocketGateway";
import { parseStartDate } from "./repositories/fileEditWindowRepository";
import type { AccessClaims, AccessRole, ServiceError as TokenError } from "./services/accessTokenService";
import type { ServiceError as AdminError } from "./services/adminService";
import type { ServiceError as EditError } from "./services/editService";
import type { ServiceError as StoreError } from "./services/recordStore";
import type { ServiceError as VerificationError } from "./services/verificationService";

type AnyServiceError = TokenError | AdminError | EditError | StoreError | VerificationError | WsError;

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown;

export function statusForCode(code: AnyServiceError["code"]): number {
  return code === "UNAUTHORIZED"
    ? 401
    : code === "NOT_VERIFIED"
      ? 403
    : code === "SESSION_EXPIRED"
      ? 410
    : code === "IMMUTABLE_FIELD"
      ? 403
    : code === "WINDOW_CLOSED"
      ? 403
    : code === "NO_PENDING_FIELD"
      ? 409
    : code === "STALE_RECORD"
      ? 409
    : code === "NOT_FOUND"
      ? 404
    : code === "INDEX_OUT_OF_RANGE"
      ? 404
    : code === "NO_SUCH_FIELD"
      ? 400
    : code === "PARSE_FAILURE"
      ? 422
    : code === "PERSIST_FAILED"
      ? 500
    : code === "IO_FAILURE"
      ? 500
    : 400;
}

function sendError(res: Response, error: AnyServiceError): void {
  res.status(statusForCode(error.code)).json(error);
}

function getBearerToken(req: Request): string | null {
  const header = req.header("authorization");
  if (typeof header !== "string") return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

function bodyRecord(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return typeof body === "object" && body !== null && !Array.isArray(body) ? { ...body } : {};
}

function bodyString(req: Request, key: string): string {
  const value = bodyRecord(req)[key];
  return typeof value === "string" ? value : "";
}

function stringValues(value: unknown): Record<string, string> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  const out: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== "string") return null;
    out[key] = v;
  }
  return out;
}

// express 4 does not observe rejected handler promises.
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

export function createApp(ctx: AppContext): express.Express {
  const { accessTokens, verification, edits, sessions, admin } = ctx;

  function authorize(req: Request, res: Response, role: AccessRole): AccessClaims | null {
    const claims = accessTokens.verify(getBearerToken(req) ?? "");
    if (!claims.ok) {
      sendError(res, claims.error);
      return null;
    }
    if (claims.value.role !== role) {
      sendError(res, { code: "UNAUTHORIZED", message: `This route requires the ${role} role.` });
      return null;
    }
    return claims.value;
  }

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  // Chat flow; the token subject is the chat identity.
  app.post(
    "/chat/start",
    route((req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      verification.begin(claims.subject);
      return res.status(200).json({ chatId: claims.subject, verified: false });
    })
  );

  app.post(
    "/chat/verify",
    route(async (req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      const result = await verification.verify(claims.subject, bodyString(req, "email"), bodyString(req, "phone"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ verified: true, ...result.value });
    })
  );

  app.get(
    "/chat/record",
    route(async (req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      const result = await edits.viewOwnRecord(claims.subject);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  app.post(
    "/chat/edit/field",
    route(async (req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      const result = await edits.chooseField(claims.subject, bodyString(req, "field"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  app.post(
    "/chat/edit/value",
    route(async (req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      const result = await edits.submitValue(claims.subject, bodyString(req, "value"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ state: "Applied", ...result.value });
    })
  );

  app.post(
    "/chat/logout",
    route((req, res) => {
      const claims = authorize(req, res, "chat");
      if (!claims) return;
      return res.status(200).json({ loggedOut: sessions.logout(claims.subject) });
    })
  );

  // Admin
  app.get(
    "/admin/records",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const table = await admin.listRecords();
      return res.status(200).json({ columns: table.columns, rows: table.rows });
    })
  );

  app.post(
    "/admin/records",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const values = stringValues(bodyRecord(req).values);
      if (!values) {
        return sendError(res, { code: "INVALID_INPUT", message: "values must be an object of strings." });
      }
      const result = await admin.addRecord(values);
      if (!result.ok) return sendError(res, result.error);
      return res.status(201).json(result.value);
    })
  );

  app.post(
    "/admin/reload",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const result = await admin.reload();
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  app.get(
    "/admin/stats",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      return res.status(200).json(await admin.stats());
    })
  );

  app.post(
    "/admin/backup",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const result = await admin.backup();
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  app.get(
    "/admin/search",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const q = typeof req.query.q === "string" ? req.query.q : "";
      const result = await admin.search(q);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ matches: result.value });
    })
  );

  app.post(
    "/admin/window/reset",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const result = await admin.resetWindow(parseStartDate(bodyString(req, "startDate")) ?? Number.NaN);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  app.post(
    "/admin/window/open",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      return res.status(200).json(await admin.openWindow());
    })
  );

  app.post(
    "/admin/window/disable",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      return res.status(200).json(await admin.disableWindow());
    })
  );

  app.post(
    "/admin/broadcast",
    route(async (req, res) => {
      if (!authorize(req, res, "admin")) return;
      const result = await admin.broadcast(bodyString(req, "text"));
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json(result.value);
    })
  );

  // Final error boundary.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : "Internal error.";
    console.error(`[RegistrantDesk] Unhandled request error: ${message}`);
    res.status(500).json({ code: "IO_FAILURE", message: "Internal error." });
  });

  return app;
}

function loadSettingsOrExit(): Settings {
  try {
    return resolveSettingsFromEnv();
  } catch (e: unknown) {
    console.error(`[RegistrantDesk] Invalid configuration: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const settings = loadSettingsOrExit();

  const server = http.createServer();
  const wss = new WebSocketServer({ server });
  let gateway: WebsocketGateway | null = null;

  const ctx = createAppContext(settings, {
    sender: {
      deliver: (chatId, text) => (gateway ? gateway.deliver(chatId, "broadcast", { text }) > 0 : false)
    }
  });
  gateway = createWebsocketGateway({ wss, accessTokens: ctx.accessTokens });

  const loaded = await ctx.records.load({ createIfMissing: true });
  if (!loaded.ok) {
    // Startup continues with an empty table; the watcher retries once the file changes.
    console.error(`[RegistrantDesk] Initial table load failed: ${loaded.error.message}`);
  }
  await ctx.actionLog.recordAction(`Service started; window day ${ctx.window.daysSinceStart()} of ${settings.windowDays}`);

  ctx.watcher.start();
  ctx.reminders.start();
  void ctx.reminders.check();

  server.on("request", createApp(ctx));
  server.listen(settings.port, () => {
    console.log(`[RegistrantDesk] Listening on http://localhost:${settings.port}`);
  });

  const activeGateway = gateway;
  const shutdown = async (): Promise<void> => {
    ctx.watcher.stop();
    ctx.reminders.stop();
    await activeGateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await ctx.actionLog.recordAction("Service stopped");
  };

  process.on("SIGINT", () => {
    void shutdown().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void shutdown().finally(() => process.exit(0));
  });
}

if (require.main === module) {
  void main();
}
