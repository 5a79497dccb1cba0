import type {
  DialogFile,
  FileDialog,
  ImageConstraints,
  MediaPicker,
  PickedMedia,
  PlatformCapabilities,
  SourceChoicePresenter,
} from "./capabilities";
import { systemClock, type Clock } from "./clock";
import type { DimensionResolver } from "./dimensions";
import { isVideoSelection } from "./source-choice";
import { buildStoragePath } from "./storage-path";
import type { MediaDimensions, MediaSource, SelectedFile, UploadedFile } from "./types";

export interface SelectionCapabilities {
  picker: MediaPicker;
  fileDialog: FileDialog;
  dimensions: DimensionResolver;
  presenter: SourceChoicePresenter;
  platform: PlatformCapabilities;
  clock?: Clock;
}

export interface SelectMediaOptions extends ImageConstraints {
  storageFolderPath?: string;
  isVideo?: boolean;
  mediaSource?: MediaSource;
  multiImage?: boolean;
  includeDimensions?: boolean;
}

export interface SelectWithSourceChoiceOptions extends ImageConstraints {
  storageFolderPath?: string;
  allowPhoto: boolean;
  allowVideo?: boolean;
  includeDimensions?: boolean;
}

export interface SelectFilesOptions {
  storageFolderPath?: string;
  allowedExtensions?: string[];
  multiFile?: boolean;
}

/**
 * Drives the pickers and turns whatever they return into `SelectedFile`s.
 *
 * Every operation resolves to `null` when the user cancels or when nothing
 * usable came back; decode and probe failures are not caught here.
 */
export class MediaSelector {
  private readonly clock: Clock;

  constructor(private readonly capabilities: SelectionCapabilities) {
    this.clock = capabilities.clock ?? systemClock;
  }

  get platform(): PlatformCapabilities {
    return this.capabilities.platform;
  }

  async selectMediaWithSourceChoice(
    options: SelectWithSourceChoiceOptions,
  ): Promise<SelectedFile[] | null> {
    const allowVideo = options.allowVideo ?? false;
    const source = await this.capabilities.presenter.presentSourceChoice({
      allowPhoto: options.allowPhoto,
      allowVideo,
      supportsCamera: this.platform.supportsCamera,
    });
    if (source === null) {
      return null;
    }
    return this.selectMedia({
      storageFolderPath: options.storageFolderPath,
      maxWidth: options.maxWidth,
      maxHeight: options.maxHeight,
      imageQuality: options.imageQuality,
      isVideo: isVideoSelection({ source, allowPhoto: options.allowPhoto, allowVideo }),
      mediaSource: source,
      includeDimensions: options.includeDimensions,
    });
  }

  async selectMedia(options: SelectMediaOptions = {}): Promise<SelectedFile[] | null> {
    const isVideo = options.isVideo ?? false;
    const includeDimensions = options.includeDimensions ?? false;
    const constraints: ImageConstraints = {
      maxWidth: options.maxWidth,
      maxHeight: options.maxHeight,
      imageQuality: options.imageQuality,
    };

    if (options.multiImage) {
      const picked = await this.capabilities.picker.pickMultiImage(constraints);
      if (picked.length === 0) {
        return null;
      }
      const files = await Promise.all(
        picked.map(async (media, index) => {
          const bytes = await media.readBytes();
          if (bytes === null) {
            return null;
          }
          return this.toSelectedFile(media, bytes, {
            storagePath: buildStoragePath(
              options.storageFolderPath,
              media.name,
              false,
              index,
              this.clock,
            ),
            isVideo,
            includeDimensions,
          });
        }),
      );
      return allPresent(files) ? files : null;
    }

    const source = (options.mediaSource ?? "camera") === "camera" ? "camera" : "gallery";
    const media = isVideo
      ? await this.capabilities.picker.pickVideo({ source })
      : await this.capabilities.picker.pickImage({ ...constraints, source });
    if (media === null) {
      return null;
    }
    const bytes = await media.readBytes();
    if (bytes === null) {
      return null;
    }
    const file = await this.toSelectedFile(media, bytes, {
      storagePath: buildStoragePath(
        options.storageFolderPath,
        media.name,
        isVideo,
        undefined,
        this.clock,
      ),
      isVideo,
      includeDimensions,
    });
    return [file];
  }

  async selectFile(
    options: Omit<SelectFilesOptions, "multiFile"> = {},
  ): Promise<SelectedFile | null> {
    const files = await this.selectFiles({ ...options, multiFile: false });
    return files?.[0] ?? null;
  }

  async selectFiles(options: SelectFilesOptions = {}): Promise<SelectedFile[] | null> {
    const multiFile = options.multiFile ?? false;
    const picked = await this.capabilities.fileDialog.pickFiles({
      allowedExtensions: options.allowedExtensions,
      allowMultiple: multiFile,
      withData: true,
    });
    if (picked === null || picked.files.length === 0) {
      return null;
    }

    if (multiFile) {
      const files = picked.files;
      if (!files.every(hasBytes)) {
        return null;
      }
      return files.map((file, index) =>
        this.fromDialogFile(
          file,
          buildStoragePath(options.storageFolderPath, file.name, false, index, this.clock),
        ),
      );
    }

    const [file] = picked.files;
    if (!file || !hasBytes(file)) {
      return null;
    }
    return [
      this.fromDialogFile(
        file,
        buildStoragePath(options.storageFolderPath, file.name, false, undefined, this.clock),
      ),
    ];
  }

  selectedFilesFromUploadedFiles(
    uploadedFiles: UploadedFile[],
    options: { storageFolderPath?: string; isMultiData?: boolean } = {},
  ): SelectedFile[] {
    const selected: SelectedFile[] = [];
    for (const [index, file] of uploadedFiles.entries()) {
      if (file.name === undefined || file.bytes === undefined) {
        continue;
      }
      selected.push({
        storagePath: buildStoragePath(
          options.storageFolderPath,
          file.name,
          false,
          options.isMultiData ? index : undefined,
          this.clock,
        ),
        bytes: file.bytes.slice(),
        blurHash: file.blurHash,
      });
    }
    return selected;
  }

  private async toSelectedFile(
    media: PickedMedia,
    bytes: Uint8Array,
    params: { storagePath: string; isVideo: boolean; includeDimensions: boolean },
  ): Promise<SelectedFile> {
    let dimensions: MediaDimensions | undefined;
    if (params.includeDimensions) {
      dimensions = await this.capabilities.dimensions.resolve({
        isVideo: params.isVideo,
        bytes,
        path: media.path,
      });
    }
    return {
      storagePath: params.storagePath,
      filePath: this.exposedPath(media.path),
      bytes: bytes.slice(),
      dimensions,
    };
  }

  private fromDialogFile(
    file: DialogFile & { bytes: Uint8Array },
    storagePath: string,
  ): SelectedFile {
    return {
      storagePath,
      filePath: this.exposedPath(file.path),
      bytes: file.bytes.slice(),
    };
  }

  private exposedPath(path: string | undefined): string | undefined {
    return this.platform.hasLocalFilePath ? path : undefined;
  }
}

function hasBytes(file: DialogFile): file is DialogFile & { bytes: Uint8Array } {
  return file.bytes !== undefined;
}

function allPresent<T>(items: (T | null)[]): items is T[] {
  return items.every((item) => item !== null);
}
