export class ImageDecodeError extends Error {
  readonly code = "IMAGE_DECODE_FAILED";
}

export class MediaProbeError extends Error {
  readonly code = "MEDIA_PROBE_FAILED";
}

export class CaptureError extends Error {
  readonly code = "CAPTURE_FAILED";
}
