import { z } from "zod";

const ExtensionSchema = z
  .string()
  .min(1)
  .regex(/^[^./\\]+$/, "extension must not contain dots or path separators");

export const StorageConfigSchema = z
  .object({
    /** Default prefix for generated storage paths. */
    folderPath: z.string().optional(),
  })
  .strict();

export const GalleryConfigSchema = z
  .object({
    dir: z.string().min(1).optional(),
  })
  .strict();

export const ImageConfigSchema = z
  .object({
    maxWidth: z.number().positive().optional(),
    maxHeight: z.number().positive().optional(),
    imageQuality: z.number().int().min(0).max(100).optional(),
  })
  .strict();

export const FilesConfigSchema = z
  .object({
    allowedExtensions: z.array(ExtensionSchema).optional(),
  })
  .strict();

export const NotifierConfigSchema = z
  .object({
    durationMs: z.number().int().positive().optional(),
  })
  .strict();
