import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../logger", () => ({
  logger: { debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import type { SelectedFile } from "../../media/types";
import { resolveOutputPath, summarizeSelection, writeSelection } from "./output";

function recordingNotifier() {
  const calls: Array<[string, { showProgress?: boolean } | undefined]> = [];
  return {
    calls,
    notify: (message: string, options?: { showProgress?: boolean }) => {
      calls.push([message, options]);
    },
  };
}

describe("summarizeSelection", () => {
  it("reports sizes instead of bytes", () => {
    const files: SelectedFile[] = [
      {
        storagePath: "uploads/1_0.png",
        filePath: "/g/a.png",
        bytes: new Uint8Array(4),
        dimensions: { width: 2, height: 1 },
      },
      { storagePath: "uploads/1_1.png", bytes: new Uint8Array(2) },
    ];
    expect(summarizeSelection(files)).toEqual([
      {
        storagePath: "uploads/1_0.png",
        filePath: "/g/a.png",
        byteLength: 4,
        dimensions: { width: 2, height: 1 },
      },
      { storagePath: "uploads/1_1.png", filePath: null, byteLength: 2, dimensions: null },
    ]);
  });
});

describe("resolveOutputPath", () => {
  it("treats storage paths as relative to the output directory", () => {
    expect(resolveOutputPath("/srv/out", "/1700000000123456.jpg")).toBe(
      path.resolve("/srv/out/1700000000123456.jpg"),
    );
    expect(resolveOutputPath("/srv/out", "uploads//a.png")).toBe(path.resolve("/srv/out/uploads/a.png"));
  });

  it("refuses paths that climb out of the directory", () => {
    expect(() => resolveOutputPath("/srv/out", "../etc/passwd")).toThrow(
      "Storage path escapes output directory: ../etc/passwd",
    );
  });
});

describe("writeSelection", () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), "media-select-out-"));
  });

  afterEach(async () => {
    await fs.rm(outDir, { recursive: true, force: true });
  });

  it("writes every file and reports success", async () => {
    const notifier = recordingNotifier();
    const ok = await writeSelection(
      [
        { storagePath: "uploads/1_0.txt", bytes: new TextEncoder().encode("first") },
        { storagePath: "uploads/nested/1_1.txt", bytes: new TextEncoder().encode("second") },
      ],
      outDir,
      notifier,
    );

    expect(ok).toBe(true);
    expect(await fs.readFile(path.join(outDir, "uploads", "1_0.txt"), "utf-8")).toBe("first");
    expect(await fs.readFile(path.join(outDir, "uploads", "nested", "1_1.txt"), "utf-8")).toBe(
      "second",
    );
    expect(notifier.calls).toEqual([
      ["Uploading file...", { showProgress: true }],
      ["Success!", undefined],
    ]);
  });

  it("reports failure without throwing", async () => {
    const notifier = recordingNotifier();
    const ok = await writeSelection(
      [{ storagePath: "../outside.txt", bytes: new Uint8Array(1) }],
      outDir,
      notifier,
    );

    expect(ok).toBe(false);
    expect(notifier.calls.at(-1)).toEqual(["Failed to upload data", undefined]);
  });
});
