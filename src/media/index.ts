export type {
  DialogFile,
  FileDialog,
  FileDialogOptions,
  ImageConstraints,
  ImageDecoder,
  MediaPicker,
  MimeResolver,
  Notifier,
  NotifyOptions,
  PickedMedia,
  PickerSource,
  PlatformCapabilities,
  SourceChoicePresenter,
  SourceChoiceRequest,
  VideoProber,
} from "./capabilities";
export { systemClock, fixedClock, type Clock } from "./clock";
export { DimensionResolver } from "./dimensions";
export { CaptureError, ImageDecodeError, MediaProbeError } from "./errors";
export { ALLOWED_FORMATS, isAllowedFormat, lookupMimeType, validateFileFormat } from "./format";
export {
  MediaSelector,
  type SelectFilesOptions,
  type SelectMediaOptions,
  type SelectWithSourceChoiceOptions,
  type SelectionCapabilities,
} from "./selection";
export {
  buildSourceOptions,
  isVideoSelection,
  SOURCE_CHOICE_TITLE,
  type SourceOption,
  type SourceOptions,
} from "./source-choice";
export { buildSignatureStoragePath, buildStoragePath, removeTrailingSlash } from "./storage-path";
export {
  MEDIA_SOURCES,
  type MediaDimensions,
  type MediaSource,
  type SelectedFile,
  type UploadedFile,
} from "./types";
