import type { MediaSelectConfig } from "../config";
import type { PlatformCapabilities } from "../media/capabilities";
import { DimensionResolver } from "../media/dimensions";
import { MediaSelector, type SelectionCapabilities } from "../media/selection";
import { FfmpegCamera, FfmpegImageTranscoder, FfmpegVideoProber, resolveFfmpegBin } from "./ffmpeg";
import { FsFileDialog } from "./fs-file-dialog";
import { FsMediaPicker } from "./fs-media-picker";
import { ImageSizeDecoder } from "./image-size-decoder";
import { PromptSourceChoicePresenter } from "./prompt-source-presenter";
import { TerminalNotifier, type NotifierStream } from "./terminal-notifier";

export { FfmpegCamera, FfmpegImageTranscoder, FfmpegVideoProber, resolveFfmpegBin } from "./ffmpeg";
export { FsFileDialog } from "./fs-file-dialog";
export { FsMediaPicker } from "./fs-media-picker";
export { ImageSizeDecoder } from "./image-size-decoder";
export { PromptSourceChoicePresenter } from "./prompt-source-presenter";
export { TerminalNotifier } from "./terminal-notifier";

/** Resolved once at startup; nothing downstream checks the host again. */
export function resolvePlatformCapabilities(config: MediaSelectConfig): PlatformCapabilities {
  return {
    supportsCamera: config.platform?.supportsCamera ?? Boolean(config.camera?.device),
    hasLocalFilePath: config.platform?.hasLocalFilePath ?? true,
  };
}

export interface NodeSelectorOptions {
  /** Files handed to the file dialog instead of prompting. */
  presetPaths?: string[];
  cwd?: string;
  overrides?: Partial<SelectionCapabilities>;
}

export function createNodeMediaSelector(
  config: MediaSelectConfig,
  options: NodeSelectorOptions = {},
): MediaSelector {
  const bin = resolveFfmpegBin(config);
  const platform = resolvePlatformCapabilities(config);
  const cwd = options.cwd ?? process.cwd();
  const device = config.camera?.device;
  const camera =
    platform.supportsCamera && device
      ? new FfmpegCamera(bin, device, {
          inputFormat: config.camera?.inputFormat,
          videoDurationSec: config.camera?.videoDurationSec,
        })
      : undefined;

  return new MediaSelector({
    picker: new FsMediaPicker({
      galleryDir: config.gallery?.dir ?? cwd,
      camera,
      transcoder: new FfmpegImageTranscoder(bin),
    }),
    fileDialog: new FsFileDialog({ presetPaths: options.presetPaths, cwd }),
    dimensions: new DimensionResolver(new ImageSizeDecoder(), new FfmpegVideoProber(bin)),
    presenter: new PromptSourceChoicePresenter(),
    platform,
    ...options.overrides,
  });
}

export function createTerminalNotifier(
  config: MediaSelectConfig,
  stream?: NotifierStream,
): TerminalNotifier {
  return new TerminalNotifier(stream, { durationMs: config.notifier?.durationMs });
}
