import { execa } from "execa";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { MediaSelectConfig } from "../config";
import { logger } from "../logger";
import type { ImageConstraints, PickedMedia, VideoProber } from "../media/capabilities";
import { CaptureError, MediaProbeError } from "../media/errors";
import { readFileOrNull } from "./fs-utils";

type CameraConfig = NonNullable<MediaSelectConfig["camera"]>;
type CameraInputFormat = NonNullable<CameraConfig["inputFormat"]>;

const DEFAULT_VIDEO_DURATION_SEC = 10;
const VIDEO_STREAM_SIZE = /Stream #\d+:\d+.*?Video: .*?\b(\d{2,5})x(\d{2,5})\b/;

export function resolveFfmpegBin(config: MediaSelectConfig): string {
  return config.ffmpeg?.binPath ?? process.env.FFMPEG_PATH ?? "ffmpeg";
}

function lastLine(output: string): string {
  return output.trim().split("\n").at(-1)?.trim() || "no output";
}

/**
 * Reads the native pixel size of the first video stream from `ffmpeg -i`.
 * ffmpeg exits non-zero when no output is given, so only the stream line
 * decides success.
 */
export class FfmpegVideoProber implements VideoProber {
  constructor(private readonly bin: string) {}

  async probe(filePath: string): Promise<{ width: number; height: number }> {
    const { stderr } = await execa(this.bin, ["-hide_banner", "-i", filePath], {
      reject: false,
    });
    const match = VIDEO_STREAM_SIZE.exec(stderr);
    if (!match) {
      throw new MediaProbeError(`Could not read video size of ${filePath}: ${lastLine(stderr)}`);
    }
    return { width: Number(match[1]), height: Number(match[2]) };
  }
}

export interface ImageTranscoder {
  resize(bytes: Uint8Array, name: string, constraints: ImageConstraints): Promise<Uint8Array>;
}

function outputCodecFor(name: string): "mjpeg" | "png" | null {
  const ext = path.extname(name).slice(1).toLowerCase();
  if (ext === "jpg" || ext === "jpeg") {
    return "mjpeg";
  }
  if (ext === "png") {
    return "png";
  }
  return null;
}

/** Maps 0-100 quality onto mjpeg's 2 (best) .. 31 (worst) scale. */
export function toMjpegQuality(imageQuality: number): number {
  return Math.round(31 - (imageQuality / 100) * 29);
}

export function buildScaleFilter(constraints: ImageConstraints): string {
  const width =
    constraints.maxWidth !== undefined ? `'min(iw,${Math.floor(constraints.maxWidth)})'` : "iw";
  const height =
    constraints.maxHeight !== undefined ? `'min(ih,${Math.floor(constraints.maxHeight)})'` : "ih";
  return `scale=w=${width}:h=${height}:force_original_aspect_ratio=decrease`;
}

/** Downscales and recompresses JPEG and PNG images; other formats pass through. */
export class FfmpegImageTranscoder implements ImageTranscoder {
  constructor(private readonly bin: string) {}

  async resize(
    bytes: Uint8Array,
    name: string,
    constraints: ImageConstraints,
  ): Promise<Uint8Array> {
    const codec = outputCodecFor(name);
    const scale = constraints.maxWidth !== undefined || constraints.maxHeight !== undefined;
    const requantize = codec === "mjpeg" && constraints.imageQuality !== undefined;
    if (codec === null || (!scale && !requantize)) {
      return bytes;
    }

    const args = ["-hide_banner", "-loglevel", "error", "-i", "pipe:0"];
    if (scale) {
      args.push("-vf", buildScaleFilter(constraints));
    }
    if (requantize && constraints.imageQuality !== undefined) {
      args.push("-q:v", String(toMjpegQuality(constraints.imageQuality)));
    }
    args.push("-frames:v", "1", "-f", "image2pipe", "-c:v", codec, "pipe:1");

    const { stdout } = await execa(this.bin, args, { input: bytes, encoding: "buffer" });
    logger.debug(
      { name, inputBytes: bytes.byteLength, outputBytes: stdout.byteLength },
      "Transcoded picked image",
    );
    return stdout;
  }
}

export function defaultCameraInputFormat(
  platform: NodeJS.Platform = process.platform,
): CameraInputFormat {
  if (platform === "darwin") {
    return "avfoundation";
  }
  if (platform === "win32") {
    return "dshow";
  }
  return "v4l2";
}

/**
 * Captures from a local camera device into a fresh temporary directory.
 * A successful capture is left on disk: the caller owns the file and its
 * directory. A failed capture removes the directory.
 */
export class FfmpegCamera {
  private readonly inputFormat: CameraInputFormat;
  private readonly videoDurationSec: number;
  private readonly tmpRoot: string;

  constructor(
    private readonly bin: string,
    private readonly device: string,
    options: Omit<CameraConfig, "device"> & { tmpRoot?: string } = {},
  ) {
    this.inputFormat = options.inputFormat ?? defaultCameraInputFormat();
    this.videoDurationSec = options.videoDurationSec ?? DEFAULT_VIDEO_DURATION_SEC;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
  }

  capturePhoto(): Promise<PickedMedia> {
    return this.capture("jpg", ["-frames:v", "1"]);
  }

  captureVideo(): Promise<PickedMedia> {
    return this.capture("mp4", ["-t", String(this.videoDurationSec)]);
  }

  private async capture(ext: string, outputArgs: string[]): Promise<PickedMedia> {
    const dir = await fs.mkdtemp(path.join(this.tmpRoot, "media-select-capture-"));
    const name = `capture_${Date.now()}.${ext}`;
    const output = path.join(dir, name);
    try {
      await execa(this.bin, [
        "-hide_banner",
        "-loglevel",
        "error",
        "-f",
        this.inputFormat,
        "-i",
        this.device,
        ...outputArgs,
        "-y",
        output,
      ]);
    } catch (error) {
      await fs.rm(dir, { recursive: true, force: true });
      throw new CaptureError(`Camera capture from ${this.device} failed`, { cause: error });
    }
    logger.debug({ device: this.device, output }, "Captured camera media");
    return {
      name,
      path: output,
      readBytes: () => readFileOrNull(output),
    };
  }
}
