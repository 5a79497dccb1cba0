import mime from "mime-types";
import type { MimeResolver, Notifier } from "./capabilities";

export const ALLOWED_FORMATS: ReadonlySet<string> = new Set([
  "image/png",
  "image/jpeg",
  "video/mp4",
  "image/gif",
]);

export const lookupMimeType: MimeResolver = (identifier) => {
  const type = mime.lookup(identifier);
  return type === false ? null : type;
};

export function isAllowedFormat(
  identifier: string,
  resolveMime: MimeResolver = lookupMimeType,
): boolean {
  const type = resolveMime(identifier);
  return type !== null && ALLOWED_FORMATS.has(type);
}

/** Like {@link isAllowedFormat}, but tells the user which type was rejected. */
export function validateFileFormat(
  identifier: string,
  notifier: Notifier,
  resolveMime: MimeResolver = lookupMimeType,
): boolean {
  const type = resolveMime(identifier);
  if (type !== null && ALLOWED_FORMATS.has(type)) {
    return true;
  }
  notifier.notify(`Invalid file format: ${type ?? "null"}`);
  return false;
}
