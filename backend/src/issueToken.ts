#!/usr/bin/env node
import { createAccessTokenService, isAccessRole } from "./services/accessTokenService";

const USAGE = "Usage: registrant-desk-token <chat|admin> <subject> [ttlSeconds]";

export function runIssueToken(argv: ReadonlyArray<string>, env: NodeJS.ProcessEnv = process.env): Readonly<{ exitCode: number; output: string }> {
  const [role, subject, ttlRaw] = argv;
  if (!isAccessRole(role) || typeof subject !== "string" || subject.trim() === "") {
    return { exitCode: 2, output: USAGE };
  }
  const secret = (env.JWT_SECRET ?? "").trim();
  if (!secret) {
    return { exitCode: 1, output: "Missing JWT_SECRET environment variable." };
  }
  const ttlSeconds = ttlRaw === undefined ? undefined : Number(ttlRaw);
  const issued = createAccessTokenService({ secret }).issue(role, subject, ttlSeconds);
  if (!issued.ok) {
    return { exitCode: 2, output: issued.error.message };
  }
  return { exitCode: 0, output: issued.value };
}

if (require.main === module) {
  const { exitCode, output } = runIssueToken(process.argv.slice(2));
  if (exitCode === 0) {
    console.log(output);
  } else {
    console.error(output);
  }
  process.exitCode = exitCode;
}
