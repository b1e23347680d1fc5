import { createInMemoryEditWindowRepository } from "../backend/src/repositories/inMemoryStateRepositories";
import { DAY_MS, createEditWindowService } from "../backend/src/services/editWindowService";
import { createCapturingLogger, createClock } from "./testSupport";

const D = Date.UTC(2024, 4, 1, 8, 0, 0);

describe("editWindowService", () => {
  it("Given a window started at D When checked at D, D+6 and D+7 Then days left are 7, 1 and 0", () => {
    const clock = createClock(D);
    const window = createEditWindowService({ repository: createInMemoryEditWindowRepository(D), nowMs: clock.now });

    expect(window.daysLeft()).toBe(7);
    expect(window.daysSinceStart()).toBe(1);
    expect(window.isEditingAllowed()).toBe(true);

    clock.set(D + 6 * DAY_MS);
    expect(window.daysLeft()).toBe(1);
    expect(window.isEditingAllowed()).toBe(true);

    clock.set(D + 7 * DAY_MS);
    expect(window.daysLeft()).toBe(0);
    expect(window.daysSinceStart()).toBe(8);
    expect(window.isEditingAllowed()).toBe(false);
  });

  it("Given no stored start When the service starts Then the window opens now and is saved", () => {
    const repository = createInMemoryEditWindowRepository(null);
    const window = createEditWindowService({ repository, nowMs: () => D });
    expect(window.status().startMs).toBe(D);
    expect(repository.saved()).toBe(D);
  });

  it("Given a start override When the service starts Then the override wins over the stored value", () => {
    const repository = createInMemoryEditWindowRepository(D - 30 * DAY_MS);
    const window = createEditWindowService({ repository, nowMs: () => D, startMsOverride: D - DAY_MS });
    expect(window.status()).toEqual({
      startMs: D - DAY_MS,
      windowDays: 7,
      daysSinceStart: 2,
      daysLeft: 6,
      editingAllowed: true,
      readOnly: false
    });
  });

  it("Given read-only mode When inside the window Then editing is not allowed", () => {
    const window = createEditWindowService({ repository: createInMemoryEditWindowRepository(D), nowMs: () => D, readOnly: true });
    expect(window.isEditingAllowed()).toBe(false);
    expect(window.daysLeft()).toBe(7);
  });

  it("Given a closed window When opened and then disabled Then editing follows and each start is persisted", () => {
    const now = D + 10 * DAY_MS;
    const repository = createInMemoryEditWindowRepository(D);
    const window = createEditWindowService({ repository, nowMs: () => now });
    expect(window.isEditingAllowed()).toBe(false);

    const opened = window.openWindow();
    expect(opened.startMs).toBe(now);
    expect(opened.editingAllowed).toBe(true);
    expect(opened.persisted).toBe(true);
    expect(repository.saved()).toBe(now);

    const disabled = window.disableWindow();
    expect(disabled.startMs).toBe(now - 1000 * DAY_MS);
    expect(disabled.editingAllowed).toBe(false);
    expect(disabled.daysLeft).toBe(0);
  });

  it("Given invalid reset values When resetWindow is called Then INVALID_INPUT is returned", () => {
    const window = createEditWindowService({ repository: createInMemoryEditWindowRepository(D), nowMs: () => D });
    expect(window.resetWindow(Number.NaN)).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Window start must be a valid timestamp." }
    });
    expect(window.resetWindow(D + 1)).toEqual({
      ok: false,
      error: { code: "INVALID_INPUT", message: "Window start cannot be in the future.", context: { startMs: D + 1 } }
    });

    const reset = window.resetWindow(D - 3 * DAY_MS);
    if (!reset.ok) throw new Error("unreachable");
    expect(reset.value.daysLeft).toBe(4);
  });

  it("Given a repository that cannot save When the window is opened Then the change applies with persisted false", () => {
    const logger = createCapturingLogger();
    const window = createEditWindowService({
      repository: {
        loadStartMs: () => D,
        saveStartMs() {
          throw new Error("read-only disk");
        }
      },
      nowMs: () => D + DAY_MS,
      logger
    });
    const opened = window.openWindow();
    expect(opened.persisted).toBe(false);
    expect(opened.startMs).toBe(D + DAY_MS);
    expect(logger.lines).toEqual([{ level: "error", text: "[RegistrantDesk] Failed to persist edit window start: read-only disk" }]);
  });

  it("Given an invalid windowDays When the service is created Then it throws", () => {
    expect(() => createEditWindowService({ repository: createInMemoryEditWindowRepository(D), windowDays: 0 })).toThrow(
      "EditWindowService requires a positive integer windowDays."
    );
  });
});
