import { z } from "zod";

export const CameraInputFormatSchema = z.enum(["v4l2", "avfoundation", "dshow"]);

export const CameraConfigSchema = z
  .object({
    /** ffmpeg input, e.g. `/dev/video0`, `0` or `video=Integrated Camera`. */
    device: z.string().min(1).optional(),
    inputFormat: CameraInputFormatSchema.optional(),
    videoDurationSec: z.number().positive().optional(),
  })
  .strict();

export const FfmpegConfigSchema = z
  .object({
    binPath: z.string().min(1).optional(),
  })
  .strict();

export const PlatformConfigSchema = z
  .object({
    supportsCamera: z.boolean().optional(),
    hasLocalFilePath: z.boolean().optional(),
  })
  .strict();
