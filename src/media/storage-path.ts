import { systemClock, type Clock } from "./clock";

const VIDEO_EXTENSION = "mp4";
const SIGNATURE_EXTENSION = "png";

export function removeTrailingSlash(path: string | undefined): string | undefined {
  if (path !== undefined && path.endsWith("/")) {
    return path.slice(0, -1);
  }
  return path;
}

function extensionOf(sourceName: string): string {
  // A name without a dot yields the whole name.
  const parts = sourceName.split(".");
  return parts[parts.length - 1] ?? sourceName;
}

/**
 * Builds `{prefix}/{timestamp}[_{index}].{ext}`.
 *
 * The timestamp is microseconds since the epoch, so paths are unique per
 * process but not across devices. `index` disambiguates members of a batch.
 */
export function buildStoragePath(
  prefix: string | undefined,
  sourceName: string,
  isVideo: boolean,
  index?: number,
  clock: Clock = systemClock,
): string {
  const normalizedPrefix = removeTrailingSlash(prefix) ?? "";
  const timestamp = clock.nowMicros();
  const ext = isVideo ? VIDEO_EXTENSION : extensionOf(sourceName);
  const indexSuffix = index !== undefined ? `_${index}` : "";
  return `${normalizedPrefix}/${timestamp}${indexSuffix}.${ext}`;
}

export function buildSignatureStoragePath(
  prefix?: string,
  clock: Clock = systemClock,
): string {
  const normalizedPrefix = removeTrailingSlash(prefix) ?? "";
  return `${normalizedPrefix}/signature_${clock.nowMicros()}.${SIGNATURE_EXTENSION}`;
}
