import { input } from "@inquirer/prompts";
import path from "node:path";
import { logger } from "../logger";
import type { DialogFile, FileDialog, FileDialogOptions } from "../media/capabilities";
import { readFileOrNull } from "./fs-utils";
import { promptOrNull } from "./prompts";

export interface FsFileDialogOptions {
  /** Paths chosen up front (e.g. CLI arguments); the prompt is skipped when set. */
  presetPaths?: string[];
  cwd?: string;
}

function parsePathList(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function matchesExtension(filePath: string, allowed: string[] | undefined): boolean {
  if (!allowed || allowed.length === 0) {
    return true;
  }
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return allowed.some((candidate) => candidate.toLowerCase() === ext);
}

export class FsFileDialog implements FileDialog {
  private readonly cwd: string;

  constructor(private readonly options: FsFileDialogOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  async pickFiles(options: FileDialogOptions): Promise<{ files: DialogFile[] } | null> {
    const requested = this.options.presetPaths?.length
      ? this.options.presetPaths
      : await this.promptForPaths(options);
    if (requested === null || requested.length === 0) {
      return null;
    }

    const accepted = requested
      .map((entry) => path.resolve(this.cwd, entry))
      .filter((filePath) => {
        const ok = matchesExtension(filePath, options.allowedExtensions);
        if (!ok) {
          logger.warn(
            { filePath, allowedExtensions: options.allowedExtensions },
            "Skipping file with disallowed extension",
          );
        }
        return ok;
      });
    const chosen = options.allowMultiple ? accepted : accepted.slice(0, 1);

    const files = await Promise.all(
      chosen.map(async (filePath): Promise<DialogFile> => {
        const bytes = options.withData ? await readFileOrNull(filePath) : null;
        return {
          name: path.basename(filePath),
          path: filePath,
          bytes: bytes ?? undefined,
        };
      }),
    );
    return { files };
  }

  private async promptForPaths(options: FileDialogOptions): Promise<string[] | null> {
    const extensions = options.allowedExtensions?.length
      ? ` (${options.allowedExtensions.join(", ")})`
      : "";
    const answer = await promptOrNull(() =>
      input({
        message: options.allowMultiple
          ? `File paths, comma separated${extensions}:`
          : `File path${extensions}:`,
      }),
    );
    return answer === null ? null : parsePathList(answer);
  }
}
