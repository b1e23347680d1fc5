import fs from "node:fs";
import path from "node:path";

import { createActionLog, formatLogTimestamp } from "../backend/src/services/actionLog";
import { createCapturingLogger, makeTempDir, removeDir } from "./testSupport";

const NOW = Date.UTC(2024, 0, 15, 9, 5, 7);

describe("actionLog", () => {
  it("Given a timestamp When formatted Then it renders UTC with second precision", () => {
    expect(formatLogTimestamp(NOW)).toBe("2024-01-15 09:05:07");
  });

  it("Given an empty logDir When createActionLog is called Then it throws", () => {
    expect(() => createActionLog({ logDir: "" })).toThrow("ActionLog requires a non-empty logDir.");
    expect(() => createActionLog({ logDir: 42 as unknown as string })).toThrow("ActionLog requires a non-empty logDir.");
  });

  it("Given actions and errors When recorded Then each goes to its own file as a single timestamped line", async () => {
    const dir = makeTempDir("actionlog");
    const logger = createCapturingLogger();
    const log = createActionLog({ logDir: path.join(dir, "logs"), nowMs: () => NOW, logger });

    try {
      await log.recordAction("Table saved due to test");
      await log.recordAction("multi\nline\r\nentry");
      await log.recordError("Disk full");

      expect(fs.readFileSync(log.actionLogPath, "utf8")).toBe(
        "[2024-01-15 09:05:07] Table saved due to test\n[2024-01-15 09:05:07] multi line entry\n"
      );
      expect(fs.readFileSync(log.errorLogPath, "utf8")).toBe("[2024-01-15 09:05:07] Disk full\n");
      expect(logger.lines).toEqual([{ level: "error", text: "[RegistrantDesk] Disk full" }]);
    } finally {
      removeDir(dir);
    }
  });

  it("Given an unwritable log directory When an action is recorded Then the failure is logged and not thrown", async () => {
    const dir = makeTempDir("actionlog");
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    const logger = createCapturingLogger();
    const log = createActionLog({ logDir: path.join(blocker, "logs"), nowMs: () => NOW, logger });

    try {
      await expect(log.recordAction("anything")).resolves.toBeUndefined();
      expect(logger.lines).toHaveLength(1);
      expect(logger.lines[0].level).toBe("error");
      expect(logger.lines[0].text.startsWith("[RegistrantDesk] Failed to append to actions.log:")).toBe(true);
    } finally {
      removeDir(dir);
    }
  });
});
