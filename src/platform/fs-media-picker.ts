import { checkbox, select } from "@inquirer/prompts";
import mime from "mime-types";
import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger";
import type {
  ImageConstraints,
  MediaPicker,
  PickedMedia,
  PickerSource,
} from "../media/capabilities";
import { CaptureError } from "../media/errors";
import type { ImageTranscoder } from "./ffmpeg";
import { readFileOrNull } from "./fs-utils";
import { promptOrNull } from "./prompts";

type GalleryKind = "image" | "video";

export interface CaptureDevice {
  capturePhoto(): Promise<PickedMedia>;
  captureVideo(): Promise<PickedMedia>;
}

export interface FsMediaPickerOptions {
  galleryDir: string;
  camera?: CaptureDevice;
  transcoder?: ImageTranscoder;
}

function hasConstraints(constraints: ImageConstraints): boolean {
  return (
    constraints.maxWidth !== undefined ||
    constraints.maxHeight !== undefined ||
    constraints.imageQuality !== undefined
  );
}

/**
 * Treats a directory as the gallery and an ffmpeg capture device as the camera.
 */
export class FsMediaPicker implements MediaPicker {
  constructor(private readonly options: FsMediaPickerOptions) {}

  async pickImage({
    source,
    ...constraints
  }: ImageConstraints & { source: PickerSource }): Promise<PickedMedia | null> {
    const media =
      source === "camera"
        ? await this.requireCamera().capturePhoto()
        : await this.chooseOne("image");
    return media ? this.constrained(media, constraints) : null;
  }

  async pickVideo({ source }: { source: PickerSource }): Promise<PickedMedia | null> {
    if (source === "camera") {
      return this.requireCamera().captureVideo();
    }
    return this.chooseOne("video");
  }

  async pickMultiImage(constraints: ImageConstraints): Promise<PickedMedia[]> {
    const entries = await this.listGallery("image");
    if (entries.length === 0) {
      return [];
    }
    const chosen = await promptOrNull(() =>
      checkbox({
        message: "Select images",
        choices: entries.map((name) => ({ name, value: name })),
      }),
    );
    return (chosen ?? []).map((name) => this.constrained(this.fromGallery(name), constraints));
  }

  private requireCamera(): CaptureDevice {
    if (!this.options.camera) {
      throw new CaptureError("No camera device is configured");
    }
    return this.options.camera;
  }

  private async chooseOne(kind: GalleryKind): Promise<PickedMedia | null> {
    const entries = await this.listGallery(kind);
    if (entries.length === 0) {
      return null;
    }
    const chosen = await promptOrNull(() =>
      select({
        message: `Select ${kind}`,
        choices: entries.map((name) => ({ name, value: name })),
      }),
    );
    return chosen === null ? null : this.fromGallery(chosen);
  }

  private async listGallery(kind: GalleryKind): Promise<string[]> {
    const dirents = await fs.readdir(this.options.galleryDir, { withFileTypes: true });
    const entries = dirents
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => {
        const type = mime.lookup(name);
        return type !== false && type.startsWith(`${kind}/`);
      })
      .sort((a, b) => a.localeCompare(b));
    if (entries.length === 0) {
      logger.warn({ galleryDir: this.options.galleryDir, kind }, "Gallery has no matching media");
    }
    return entries;
  }

  private fromGallery(name: string): PickedMedia {
    const filePath = path.join(this.options.galleryDir, name);
    return {
      name,
      path: filePath,
      readBytes: () => readFileOrNull(filePath),
    };
  }

  private constrained(media: PickedMedia, constraints: ImageConstraints): PickedMedia {
    const transcoder = this.options.transcoder;
    if (!transcoder || !hasConstraints(constraints)) {
      return media;
    }
    return {
      name: media.name,
      path: media.path,
      readBytes: async () => {
        const bytes = await media.readBytes();
        return bytes === null ? null : transcoder.resize(bytes, media.name, constraints);
      },
    };
  }
}
