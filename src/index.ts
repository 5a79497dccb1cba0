export * from "./media";
export {
  createNodeMediaSelector,
  createTerminalNotifier,
  resolvePlatformCapabilities,
  FfmpegCamera,
  FfmpegImageTranscoder,
  FfmpegVideoProber,
  FsFileDialog,
  FsMediaPicker,
  ImageSizeDecoder,
  PromptSourceChoicePresenter,
  TerminalNotifier,
  type NodeSelectorOptions,
} from "./platform";
export {
  loadConfig,
  loadConfigOrDefaults,
  MediaSelectConfigSchema,
  type MediaSelectConfig,
} from "./config";
export { logger, configureLogger } from "./logger";
