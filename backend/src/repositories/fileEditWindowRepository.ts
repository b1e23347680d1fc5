import type { EditWindowRepository } from "../services/editWindowService";
import { isRecord, readJsonStateFile, writeJsonStateFile } from "./jsonStateFile";

const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Parses an ISO timestamp; one without a zone designator is read as UTC. */
export function parseStartDate(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  const dateOnly = /^\d{4}-\d{2}-\d{2}$/.test(trimmed);
  const candidate = dateOnly || HAS_ZONE.test(trimmed) ? trimmed : `${trimmed}Z`;
  const ms = Date.parse(candidate);
  return Number.isFinite(ms) ? ms : null;
}

export function createFileEditWindowRepository(filePath: string): EditWindowRepository {
  return {
    loadStartMs(): number | null {
      const parsed = readJsonStateFile(filePath);
      if (parsed === null) return null;
      if (!isRecord(parsed)) {
        throw new Error("Invalid edit window store format.");
      }
      // Files written before versioning carry a bare start_date.
      const raw = parsed.version === 1 ? parsed.startDate : parsed.start_date;
      if (typeof raw !== "string") {
        throw new Error("Invalid edit window store format.");
      }
      const startMs = parseStartDate(raw);
      if (startMs === null) {
        throw new Error(`Invalid edit window start date "${raw}".`);
      }
      return startMs;
    },

    saveStartMs(startMs: number): void {
      writeJsonStateFile(filePath, { version: 1, startDate: new Date(startMs).toISOString() });
    }
  };
}
