import jwt from "jsonwebtoken";

export type ErrorCode = "UNAUTHORIZED" | "INVALID_INPUT";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type AccessRole = "chat" | "admin";

export type AccessClaims = Readonly<{
  role: AccessRole;
  subject: string;
  expiresAtMs: number;
}>;

export type AccessTokenService = Readonly<{
  issue(role: AccessRole, subject: string, ttlSeconds?: number): Result<string>;
  verify(token: string): Result<AccessClaims>;
}>;

export type AccessTokenServiceDeps = Readonly<{
  secret: string;
  nowMs?: () => number;
  defaultTtlSeconds?: number;
}>;

export const DEFAULT_TOKEN_TTL_SECONDS = 30 * 24 * 60 * 60;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

export function isAccessRole(value: unknown): value is AccessRole {
  return value === "chat" || value === "admin";
}

export function createAccessTokenService(deps: AccessTokenServiceDeps): AccessTokenService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const defaultTtlSeconds = deps.defaultTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;

  if (typeof deps.secret !== "string" || deps.secret.trim() === "") {
    throw new Error("AccessTokenService requires a non-empty secret.");
  }
  if (!Number.isInteger(defaultTtlSeconds) || defaultTtlSeconds <= 0) {
    throw new Error("AccessTokenService requires a positive integer defaultTtlSeconds.");
  }

  return {
    issue(role: AccessRole, subject: string, ttlSeconds: number = defaultTtlSeconds): Result<string> {
      const sub = String(subject ?? "").trim();
      if (!sub) {
        return err("INVALID_INPUT", "A token subject is required.");
      }
      if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
        return err("INVALID_INPUT", "Token lifetime must be a positive number of seconds.", { ttlSeconds });
      }
      const iat = Math.floor(nowMs() / 1000);
      const token = jwt.sign({ role, sub, iat, exp: iat + ttlSeconds }, deps.secret, { algorithm: "HS256" });
      return ok(token);
    },

    verify(token: string): Result<AccessClaims> {
      const raw = String(token ?? "").trim();
      if (!raw) {
        return err("UNAUTHORIZED", "Missing access token.");
      }
      let decoded: string | jwt.JwtPayload;
      try {
        decoded = jwt.verify(raw, deps.secret, {
          algorithms: ["HS256"],
          clockTimestamp: Math.floor(nowMs() / 1000)
        });
      } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        return err("UNAUTHORIZED", "Invalid access token.", { reason });
      }
      if (typeof decoded === "string") {
        return err("UNAUTHORIZED", "Invalid access token.");
      }
      const role: unknown = decoded.role;
      const subject = decoded.sub;
      const exp = decoded.exp;
      if (!isAccessRole(role) || typeof subject !== "string" || subject.trim() === "" || typeof exp !== "number") {
        return err("UNAUTHORIZED", "Invalid access token claims.");
      }
      return ok({ role, subject, expiresAtMs: exp * 1000 });
    }
  };
}
