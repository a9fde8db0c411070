import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import prompts from "prompts";
import chalk from "chalk";
import { AnnotationStore } from "../annotations/store.js";
import { runInteractiveSession } from "./interactive.js";

// An Error answer makes prompts behave as if the user pressed Esc
const cancel = () => new Error("cancelled");

describe("runInteractiveSession", () => {
  let dir: string;
  let filePath: string;
  let store: AnnotationStore;
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

  beforeEach(() => {
    chalk.level = 0;
    dir = mkdtempSync(join(tmpdir(), "annotate-session-"));
    filePath = join(dir, ".annotations");
    store = new AnnotationStore({ filePath });
    logSpy.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterAll(() => {
    logSpy.mockRestore();
  });

  it("deletes the confirmed entry and saves on close", async () => {
    writeFileSync(filePath, "1000 hello\n2000 world\n");
    prompts.inject([0, true, cancel()]);

    const removed = await runInteractiveSession(store, { clock: () => 5000 });

    expect(removed).toBe(1);
    expect(readFileSync(filePath, "utf-8")).toBe("2000 world\n");
  });

  it("keeps everything when deletion is declined", async () => {
    writeFileSync(filePath, "1000 hello\n2000 world\n");
    prompts.inject([1, false, cancel()]);

    const removed = await runInteractiveSession(store, { clock: () => 5000 });

    expect(removed).toBe(0);
    expect(readFileSync(filePath, "utf-8")).toBe("1000 hello\n2000 world\n");
  });

  it("treats a cancelled confirmation as no", async () => {
    writeFileSync(filePath, "1000 hello\n2000 world\n");
    prompts.inject([1, cancel(), cancel()]);

    expect(await runInteractiveSession(store, { clock: () => 5000 })).toBe(0);
    expect(readFileSync(filePath, "utf-8")).toBe("1000 hello\n2000 world\n");
  });

  it("can remove several entries in one session", async () => {
    writeFileSync(filePath, "1 a\n2 b\n3 c\n");
    prompts.inject([1, true, 1, true, cancel()]);

    expect(await runInteractiveSession(store, { clock: () => 10 })).toBe(2);
    expect(readFileSync(filePath, "utf-8")).toBe("1 a\n");
  });

  it("shows the empty state when there is nothing to list", async () => {
    writeFileSync(filePath, "");

    expect(await runInteractiveSession(store)).toBe(0);
    expect(logSpy.mock.calls).toEqual([
      ["You have not registered any annotation!"],
      ["Try: annotate [text]"],
    ]);
    expect(readFileSync(filePath, "utf-8")).toBe("");
  });

  it("closes with the empty state after the last entry is removed", async () => {
    writeFileSync(filePath, "1000 only\n");
    const messages: string[] = [];
    prompts.inject([0, true]);

    const removed = await runInteractiveSession(store, {
      clock: () => 5000,
      log: (m) => messages.push(m),
    });

    expect(removed).toBe(1);
    expect(readFileSync(filePath, "utf-8")).toBe("");
    expect(logSpy).toHaveBeenCalledWith("You have not registered any annotation!");
    expect(messages).toEqual(["Removed annotation 1000", "Session closed with 0 annotations"]);
  });
});
