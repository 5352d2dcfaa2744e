import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DocumentReadError } from "./errors.js";
import { readProjectDocument } from "./project-document.js";

describe("readProjectDocument", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "project-document-"));
  });

  afterEach(async () => {
    await fse.remove(tmpDir);
  });

  it("decodes the modelled fields and drops the rest", async () => {
    const docPath = path.join(tmpDir, "demo.tscproj");
    await fse.writeJson(docPath, {
      title: "Demo",
      sourceBin: [
        { id: 1, src: "rec.trec", sourceTracks: [{ metaData: "a.trec;b.trec", range: [0, 1] }] },
      ],
    });

    const result = await readProjectDocument(docPath);

    expect(result).toEqual({
      ok: true,
      document: {
        sourceBin: [{ src: "rec.trec", sourceTracks: [{ metaData: "a.trec;b.trec" }] }],
      },
    });
  });

  it("accepts a leading byte order mark", async () => {
    const docPath = path.join(tmpDir, "bom.tscproj");
    await fse.writeFile(docPath, `\uFEFF${JSON.stringify({ sourceBin: [{ src: "x.trec" }] })}`, "utf8");

    const result = await readProjectDocument(docPath);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.document.sourceBin.map((s) => s.src)).toEqual(["x.trec"]);
  });

  it("reports invalid JSON as a document read error", async () => {
    const docPath = path.join(tmpDir, "broken.tscproj");
    await fse.writeFile(docPath, "{ not json", "utf8");

    const result = await readProjectDocument(docPath);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DocumentReadError);
    expect(result.error.documentPath).toBe(docPath);
    expect(result.error.message).toMatch(/^Invalid JSON: /);
  });

  it("reports a missing file as a document read error", async () => {
    const docPath = path.join(tmpDir, "missing.tscproj");

    const result = await readProjectDocument(docPath);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Failed to read file: .*ENOENT/);
  });
});
