import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildCleanupPlan, executeCleanupPlan, type CleanupPlan } from "./cleanup.js";
import type { Diagnostic } from "./diagnostics.js";
import { DeletionError } from "./errors.js";
import type { EventLogger, LogEventInput } from "./logger.js";

class RecordingLogger implements EventLogger {
  readonly events: LogEventInput[] = [];

  log(event: LogEventInput): void {
    this.events.push(event);
  }
}

describe("cleanup", () => {
  let tmpDir: string;
  let docPath: string;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cleanup-"));
    docPath = path.join(tmpDir, "proj.tscproj");
    await fse.writeJson(docPath, { sourceBin: [{ src: "a.trec" }] });
    for (const file of ["a.trec", "b.trec", "c.mp4"]) {
      await fse.writeFile(path.join(tmpDir, file), "");
    }
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  async function plannedFor(
    target: string,
    opts: Parameters<typeof buildCleanupPlan>[1] = {},
  ): Promise<CleanupPlan> {
    const result = await buildCleanupPlan(target, opts);
    if (result.status !== "planned") {
      throw new Error(`expected a plan, got: ${result.error.message}`);
    }
    return result.plan;
  }

  describe("buildCleanupPlan", () => {
    it("offers unreferenced recordings in typed-only mode", async () => {
      const plan = await plannedFor(docPath);

      expect(plan.deletions).toEqual(["b.trec"]);
      expect(plan.inventory).toEqual(["a.trec", "b.trec", "c.mp4", "proj.tscproj"]);
      expect(plan.diagnostics.map((d) => d.message)).toEqual([
        "Processing project file: proj.tscproj",
        `Looking for unused .trec files in directory: ${tmpDir}`,
      ]);
      expect(plan.summary?.message).toBe(`Found 1 unused .trec files in ${tmpDir}:`);
      expect(plan.usedFiles).toBeUndefined();
    });

    it("offers every unreferenced file in all-unused mode", async () => {
      const plan = await plannedFor(tmpDir, { mode: "all-unused" });

      expect(plan.deletions).toEqual(["b.trec", "c.mp4"]);
      expect(plan.summary?.message).toBe(`Found 2 unused files in ${tmpDir}:`);
    });

    it("lists used files when asked", async () => {
      const plan = await plannedFor(docPath, { listUsed: true });

      expect(plan.usedFiles).toEqual([
        { name: "a.trec", present: true },
        { name: "proj.tscproj", present: true },
      ]);
    });

    it("finds used files in sub-folders and at absolute paths", async () => {
      const elsewhere = path.join(tmpDir, "shared", "music.wav");
      await fse.outputFile(path.join(tmpDir, "media", "clip.mp4"), "");
      await fse.outputFile(elsewhere, "");
      await fse.writeJson(docPath, {
        sourceBin: [{ src: "media/clip.mp4" }, { src: elsewhere }, { src: "media/gone.mp4" }],
      });

      const plan = await plannedFor(docPath, { mode: "all-unused", listUsed: true });

      expect(plan.usedFiles).toEqual([
        { name: elsewhere, present: true },
        { name: "media/clip.mp4", present: true },
        { name: "media/gone.mp4", present: false },
        { name: "proj.tscproj", present: true },
      ]);
    });

    it("reads the document for the used-file listing even without recordings", async () => {
      await fse.remove(path.join(tmpDir, "a.trec"));
      await fse.remove(path.join(tmpDir, "b.trec"));

      const plan = await plannedFor(docPath, { listUsed: true });

      expect(plan.deletions).toEqual([]);
      expect(plan.diagnostics.map((d) => d.code)).not.toContain("no-auxiliary-files");
      expect(plan.summary?.message).toBe(`No unused .trec files found in ${tmpDir}`);
      expect(plan.usedFiles).toEqual([
        { name: "a.trec", present: false },
        { name: "proj.tscproj", present: true },
      ]);
    });

    it("stops early when there are no recordings to consider", async () => {
      await fse.remove(path.join(tmpDir, "a.trec"));
      await fse.remove(path.join(tmpDir, "b.trec"));
      await fse.writeFile(docPath, "not json", "utf8");

      const plan = await plannedFor(docPath);

      expect(plan.deletions).toEqual([]);
      expect(plan.summary).toBeUndefined();
      expect(plan.diagnostics.at(-1)).toEqual({
        severity: "info",
        code: "no-auxiliary-files",
        message: `No .trec files found in ${tmpDir}`,
      });
    });

    it("treats an unreadable document as referencing nothing", async () => {
      await fse.writeFile(docPath, "{ broken", "utf8");
      const logger = new RecordingLogger();

      const plan = await plannedFor(docPath, { mode: "all-unused", logger });

      expect(plan.deletions).toEqual(["a.trec", "b.trec", "c.mp4"]);
      const failure = plan.diagnostics.find((d) => d.severity === "error");
      expect(failure?.code).toBe("document-read-error");
      expect(failure?.message).toMatch(/^Error processing proj\.tscproj: Invalid JSON: /);
      expect(logger.events.map((e) => e.type)).toEqual(["project.scan", "document.read_error"]);
    });

    it("skips a target that is not a project document", async () => {
      const target = path.join(tmpDir, "c.mp4");
      const logger = new RecordingLogger();

      const result = await buildCleanupPlan(target, { logger });

      expect(result.status).toBe("skipped");
      if (result.status !== "skipped") return;
      expect(result.diagnostics).toEqual([
        {
          severity: "error",
          code: "path-resolution-error",
          message: `Error: ${target} is not a .tscproj file`,
          cause: result.error,
        },
      ]);
      expect(logger.events.map((e) => e.type)).toEqual(["project.skipped"]);
    });
  });

  describe("executeCleanupPlan", () => {
    it("only reports what it would trash in dry-run mode", async () => {
      const plan = await plannedFor(tmpDir, { mode: "all-unused" });
      const reported: Diagnostic[] = [];
      let calls = 0;

      const outcomes = await executeCleanupPlan(plan, {
        trash: async () => {
          calls += 1;
        },
        report: (d) => reported.push(d),
      });

      expect(outcomes).toEqual([
        { file: "b.trec", status: "would-trash" },
        { file: "c.mp4", status: "would-trash" },
      ]);
      expect(reported.map((d) => d.message)).toEqual([
        "Would send to trash: b.trec",
        "Would send to trash: c.mp4",
      ]);
      expect(calls).toBe(0);
    });

    it("keeps going after a file fails to move", async () => {
      const plan = await plannedFor(tmpDir, { mode: "all-unused" });
      const reported: Diagnostic[] = [];
      const moved: string[] = [];
      const logger = new RecordingLogger();

      const outcomes = await executeCleanupPlan(plan, {
        dryRun: false,
        trash: async (filePath) => {
          if (path.basename(filePath) === "b.trec") {
            throw new Error("permission denied");
          }
          moved.push(filePath);
        },
        report: (d) => reported.push(d),
        logger,
      });

      expect(outcomes.map((o) => o.status)).toEqual(["failed", "trashed"]);
      const failed = outcomes[0];
      if (failed?.status !== "failed") throw new Error("expected the first move to fail");
      expect(failed.error).toBeInstanceOf(DeletionError);
      expect(failed.error.filePath).toBe(path.join(tmpDir, "b.trec"));
      expect(moved).toEqual([path.join(tmpDir, "c.mp4")]);
      expect(reported.map((d) => d.message)).toEqual([
        "Sending to trash: b.trec",
        "Error sending b.trec to trash: permission denied",
        "Sending to trash: c.mp4",
      ]);
      expect(logger.events.map((e) => e.type)).toEqual(["file.trash_failed", "file.trashed"]);
    });
  });
});
