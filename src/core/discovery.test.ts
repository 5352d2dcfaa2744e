import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { discoverProjects } from "./discovery.js";

describe("discoverProjects", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "discovery-"));
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  it("finds documents at every depth, sorted", async () => {
    await fse.outputJson(path.join(tmpDir, "b", "Two.tscproj"), {});
    await fse.outputJson(path.join(tmpDir, "a", "deep", "One.TSCPROJ"), {});
    await fse.outputJson(path.join(tmpDir, "root.tscproj"), {});
    await fse.outputFile(path.join(tmpDir, "a", "clip.trec"), "");

    expect(await discoverProjects(tmpDir)).toEqual([
      path.join(tmpDir, "a", "deep", "One.TSCPROJ"),
      path.join(tmpDir, "b", "Two.tscproj"),
      path.join(tmpDir, "root.tscproj"),
    ]);
  });

  it("returns a document path as is", async () => {
    const docPath = path.join(tmpDir, "solo.tscproj");
    await fse.outputJson(docPath, {});

    expect(await discoverProjects(docPath)).toEqual([docPath]);
  });

  it("returns nothing for a tree without documents", async () => {
    await fse.outputFile(path.join(tmpDir, "x", "clip.trec"), "");

    expect(await discoverProjects(tmpDir)).toEqual([]);
  });
});
