import { z } from "zod";
import { LoggingSchema } from "./logging";
import {
  FilesConfigSchema,
  GalleryConfigSchema,
  ImageConfigSchema,
  NotifierConfigSchema,
  StorageConfigSchema,
} from "./media";
import { CameraConfigSchema, FfmpegConfigSchema, PlatformConfigSchema } from "./platform";

export const MediaSelectConfigSchema = z
  .object({
    $schema: z.string().optional(),
    logging: LoggingSchema.optional(),
    storage: StorageConfigSchema.optional(),
    platform: PlatformConfigSchema.optional(),
    ffmpeg: FfmpegConfigSchema.optional(),
    camera: CameraConfigSchema.optional(),
    gallery: GalleryConfigSchema.optional(),
    image: ImageConfigSchema.optional(),
    files: FilesConfigSchema.optional(),
    notifier: NotifierConfigSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.platform?.supportsCamera === true && !value.camera?.device) {
      ctx.addIssue({
        code: "custom",
        path: ["camera", "device"],
        message: "camera.device is required when platform.supportsCamera is true",
      });
    }
  });

export type MediaSelectConfig = z.infer<typeof MediaSelectConfigSchema>;
