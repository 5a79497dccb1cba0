import type { MediaSelectConfig } from "../../config";
import type { ImageConstraints } from "../../media/capabilities";
import type { SelectedFile } from "../../media/types";
import { createNodeMediaSelector, createTerminalNotifier } from "../../platform";
import { loadCommandConfig, resolvePrefix, type CommonOptions } from "./context";
import { printSelection, writeSelection } from "./output";

export interface ImageOptions {
  maxWidth?: number;
  maxHeight?: number;
  quality?: number;
}

export interface PickOptions extends CommonOptions, ImageOptions {
  video?: boolean;
  multi?: boolean;
  camera?: boolean;
  dimensions?: boolean;
}

export interface ChooseOptions extends CommonOptions, ImageOptions {
  photo?: boolean;
  allowVideo?: boolean;
  dimensions?: boolean;
}

export interface FilesOptions extends CommonOptions {
  multi?: boolean;
  ext?: string[];
}

function resolveImageConstraints(
  options: ImageOptions,
  config: MediaSelectConfig,
): ImageConstraints {
  return {
    maxWidth: options.maxWidth ?? config.image?.maxWidth,
    maxHeight: options.maxHeight ?? config.image?.maxHeight,
    imageQuality: options.quality ?? config.image?.imageQuality,
  };
}

async function finish(
  files: SelectedFile[] | null,
  options: CommonOptions,
  config: MediaSelectConfig,
): Promise<void> {
  if (files !== null && options.out) {
    const notifier = createTerminalNotifier(config);
    const ok = await writeSelection(files, options.out, notifier);
    notifier.settle();
    if (!ok) {
      process.exitCode = 1;
    }
  }
  printSelection(files);
}

export async function runPick(options: PickOptions): Promise<void> {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  const selector = createNodeMediaSelector(config);
  const files = await selector.selectMedia({
    ...resolveImageConstraints(options, config),
    storageFolderPath: resolvePrefix(options, config),
    isVideo: options.video ?? false,
    mediaSource: options.camera ? "camera" : options.video ? "videoGallery" : "photoGallery",
    multiImage: options.multi ?? false,
    includeDimensions: options.dimensions ?? false,
  });
  await finish(files, options, config);
}

export async function runChoose(options: ChooseOptions): Promise<void> {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  const selector = createNodeMediaSelector(config);
  const files = await selector.selectMediaWithSourceChoice({
    ...resolveImageConstraints(options, config),
    storageFolderPath: resolvePrefix(options, config),
    allowPhoto: options.photo ?? true,
    allowVideo: options.allowVideo ?? false,
    includeDimensions: options.dimensions ?? false,
  });
  await finish(files, options, config);
}

export async function runFiles(paths: string[], options: FilesOptions): Promise<void> {
  const config = loadCommandConfig(options.config);
  if (!config) {
    return;
  }
  const selector = createNodeMediaSelector(config, { presetPaths: paths });
  const files = await selector.selectFiles({
    storageFolderPath: resolvePrefix(options, config),
    allowedExtensions: options.ext ?? config.files?.allowedExtensions,
    multiFile: options.multi ?? false,
  });
  await finish(files, options, config);
}
