#!/usr/bin/env node
import { Command } from "commander";
import { logger } from "../logger";
import { APP_VERSION } from "../version";
import {
  parseExtensionList,
  parseNonNegativeInt,
  parsePositiveNumber,
  parseQuality,
} from "./options";

function withImageOptions(command: Command): Command {
  return command
    .option("--max-width <px>", "Downscale images wider than this", parsePositiveNumber)
    .option("--max-height <px>", "Downscale images taller than this", parsePositiveNumber)
    .option("--quality <0-100>", "JPEG quality for downscaled images", parseQuality);
}

const program = new Command()
  .name("media-select")
  .description("Pick media and files, and derive their storage paths")
  .version(APP_VERSION);

withImageOptions(
  program
    .command("pick")
    .description("Pick an image or video from the gallery directory or camera")
    .option("-c, --config <path>", "Config file path")
    .option("--video", "Pick a video instead of an image")
    .option("--multi", "Pick several images")
    .option("--camera", "Capture from the configured camera")
    .option("--dimensions", "Resolve width and height")
    .option("-p, --prefix <path>", "Storage path prefix")
    .option("-o, --out <dir>", "Write the selection under this directory"),
).action(async (options) => {
  const { runPick } = await import("./commands/select");
  await runPick(options);
});

withImageOptions(
  program
    .command("choose")
    .description("Ask for the source first, then pick media from it")
    .option("-c, --config <path>", "Config file path")
    .option("--allow-video", "Offer video sources")
    .option("--no-photo", "Do not offer photo sources")
    .option("--dimensions", "Resolve width and height")
    .option("-p, --prefix <path>", "Storage path prefix")
    .option("-o, --out <dir>", "Write the selection under this directory"),
).action(async (options) => {
  const { runChoose } = await import("./commands/select");
  await runChoose(options);
});

program
  .command("files [paths...]")
  .description("Pick arbitrary files (prompts when no paths are given)")
  .option("-c, --config <path>", "Config file path")
  .option("--multi", "Accept several files")
  .option("--ext <list>", "Comma separated allowed extensions", parseExtensionList)
  .option("-p, --prefix <path>", "Storage path prefix")
  .option("-o, --out <dir>", "Write the selection under this directory")
  .action(async (paths: string[], options) => {
    const { runFiles } = await import("./commands/select");
    await runFiles(paths, options);
  });

program
  .command("path <name>")
  .description("Print the storage path a file would get")
  .option("-c, --config <path>", "Config file path")
  .option("--video", "Treat the file as video (forces .mp4)")
  .option("-i, --index <n>", "Batch index suffix", parseNonNegativeInt)
  .option("-p, --prefix <path>", "Storage path prefix")
  .action(async (name: string, options) => {
    const { runPath } = await import("./commands/paths");
    runPath(name, options);
  });

program
  .command("signature-path")
  .description("Print a storage path for a signature image")
  .option("-c, --config <path>", "Config file path")
  .option("-p, --prefix <path>", "Storage path prefix")
  .action(async (options) => {
    const { runSignaturePath } = await import("./commands/paths");
    runSignaturePath(options);
  });

program
  .command("validate <files...>")
  .description("Check files against the allowed upload formats")
  .option("-c, --config <path>", "Config file path")
  .action(async (files: string[], options) => {
    const { runValidate } = await import("./commands/validate");
    runValidate(files, options);
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ err: error }, "Command failed");
  process.exitCode = 1;
});

export { program };
