import type { ActionLog, Logger } from "./actionLog";
import type { LoadOutcome, RecordStore } from "./recordStore";

export type FileWatcher = Readonly<{
  start(): void;
  stop(): void;
  /** Resolves true when the table was reloaded on this tick. */
  tick(): Promise<boolean>;
  isRunning(): boolean;
}>;

export type FileWatcherDeps = Readonly<{
  store: Pick<RecordStore, "load" | "fileModifiedMs">;
  intervalMs: number;
  logger?: Logger;
  actionLog?: Pick<ActionLog, "recordError">;
  onReload?: (outcome: LoadOutcome) => void;
}>;

export const DEFAULT_POLL_INTERVAL_MS = 8_000;

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function createFileWatcher(deps: FileWatcherDeps): FileWatcher {
  const logger = deps.logger ?? console;
  const intervalMs = deps.intervalMs;

  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new Error("FileWatcher requires a positive intervalMs.");
  }

  let running = false;
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<boolean> | null = null;
  // Tracked separately from the store so a file that fails to parse is retried only once it changes again.
  let lastSeenMtimeMs: number | null = null;
  let missingReported = false;

  async function check(): Promise<boolean> {
    try {
      const mtimeMs = await deps.store.fileModifiedMs();
      if (mtimeMs === null) {
        // The loaded table stays in place until the file reappears.
        if (!missingReported) {
          logger.warn("[RegistrantDesk] Table file is missing; keeping the loaded table.");
          missingReported = true;
        }
        return false;
      }
      missingReported = false;
      if (mtimeMs === lastSeenMtimeMs) return false;
      lastSeenMtimeMs = mtimeMs;

      const loaded = await deps.store.load();
      if (!loaded.ok) {
        logger.error(`[RegistrantDesk] Table reload failed: ${loaded.error.message}`);
        return false;
      }
      if (loaded.value.reloaded) {
        logger.log(`[RegistrantDesk] Table file changed; reloaded ${loaded.value.rowCount} rows.`);
        deps.onReload?.(loaded.value);
      }
      return loaded.value.reloaded;
    } catch (e: unknown) {
      logger.error(`[RegistrantDesk] File watcher tick failed: ${describe(e)}`);
      if (deps.actionLog) {
        await deps.actionLog.recordError(`File watcher tick failed: ${describe(e)}`);
      }
      return false;
    }
  }

  function schedule(): void {
    if (!running) return;
    timer = setTimeout(() => {
      timer = null;
      void tick().then(schedule);
    }, intervalMs);
  }

  function tick(): Promise<boolean> {
    if (inFlight) return inFlight;
    inFlight = check().finally(() => {
      inFlight = null;
    });
    return inFlight;
  }

  return {
    start(): void {
      if (running) return;
      running = true;
      schedule();
    },

    stop(): void {
      running = false;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },

    tick,

    isRunning(): boolean {
      return running;
    }
  };
}
