import type { MediaDimensions, MediaSource } from "./types";

/** Where a single-item picker should take media from. */
export type PickerSource = "camera" | "gallery";

export interface ImageConstraints {
  maxWidth?: number;
  maxHeight?: number;
  /** 0-100, applies to lossy formats only */
  imageQuality?: number;
}

export interface PickedMedia {
  name: string;
  path?: string;
  /** Resolves to null when the item has no readable payload. */
  readBytes(): Promise<Uint8Array | null>;
}

export interface MediaPicker {
  pickImage(options: ImageConstraints & { source: PickerSource }): Promise<PickedMedia | null>;
  pickVideo(options: { source: PickerSource }): Promise<PickedMedia | null>;
  /** Empty when the user cancels. */
  pickMultiImage(options: ImageConstraints): Promise<PickedMedia[]>;
}

export interface DialogFile {
  name: string;
  path?: string;
  bytes?: Uint8Array;
}

export interface FileDialogOptions {
  allowedExtensions?: string[];
  allowMultiple: boolean;
  withData: boolean;
}

export interface FileDialog {
  pickFiles(options: FileDialogOptions): Promise<{ files: DialogFile[] } | null>;
}

export interface ImageDecoder {
  decode(bytes: Uint8Array): Promise<Required<MediaDimensions>>;
}

export interface VideoProber {
  probe(path: string): Promise<Required<MediaDimensions>>;
}

export type MimeResolver = (identifier: string) => string | null;

export interface NotifyOptions {
  /** Keeps the notification up with a busy indicator until it is replaced. */
  showProgress?: boolean;
}

export interface Notifier {
  notify(message: string, options?: NotifyOptions): void;
}

export interface SourceChoiceRequest {
  allowPhoto: boolean;
  allowVideo: boolean;
  supportsCamera: boolean;
}

export interface SourceChoicePresenter {
  presentSourceChoice(request: SourceChoiceRequest): Promise<MediaSource | null>;
}

export interface PlatformCapabilities {
  supportsCamera: boolean;
  hasLocalFilePath: boolean;
}
