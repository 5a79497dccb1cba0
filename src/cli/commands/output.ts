import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../../logger";
import type { Notifier } from "../../media/capabilities";
import type { MediaDimensions, SelectedFile } from "../../media/types";

export interface SelectionSummary {
  storagePath: string;
  filePath: string | null;
  byteLength: number;
  dimensions: MediaDimensions | null;
}

export function summarizeSelection(files: SelectedFile[]): SelectionSummary[] {
  return files.map((file) => ({
    storagePath: file.storagePath,
    filePath: file.filePath ?? null,
    byteLength: file.bytes.byteLength,
    dimensions: file.dimensions ?? null,
  }));
}

export function printSelection(files: SelectedFile[] | null): void {
  if (files === null) {
    console.log("null");
    return;
  }
  console.log(JSON.stringify(summarizeSelection(files), null, 2));
}

export function resolveOutputPath(outDir: string, storagePath: string): string {
  const root = path.resolve(outDir);
  const target = path.resolve(root, `.${path.sep}${storagePath}`);
  if (target !== root && !target.startsWith(`${root}${path.sep}`)) {
    throw new Error(`Storage path escapes output directory: ${storagePath}`);
  }
  return target;
}

/**
 * Writes each file under `outDir/<storagePath>`, reporting progress through
 * the notifier the way an upload would.
 */
export async function writeSelection(
  files: SelectedFile[],
  outDir: string,
  notifier: Notifier,
): Promise<boolean> {
  notifier.notify("Uploading file...", { showProgress: true });
  try {
    await Promise.all(
      files.map(async (file) => {
        const target = resolveOutputPath(outDir, file.storagePath);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, file.bytes);
      }),
    );
  } catch (error) {
    logger.error({ err: error, outDir }, "Failed to write selected files");
    notifier.notify("Failed to upload data");
    return false;
  }
  notifier.notify("Success!");
  return true;
}
