import { imageSize } from "image-size";
import type { ImageDecoder } from "../media/capabilities";
import { ImageDecodeError } from "../media/errors";

function measure(buffer: Buffer) {
  try {
    return imageSize(buffer);
  } catch (error) {
    throw new ImageDecodeError(
      `Unsupported image data: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/** Reads raster dimensions from the image header without decoding pixels. */
export class ImageSizeDecoder implements ImageDecoder {
  async decode(bytes: Uint8Array): Promise<{ width: number; height: number }> {
    const size = measure(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
    if (!size.width || !size.height) {
      throw new ImageDecodeError(`Image of type ${size.type ?? "unknown"} reports no dimensions`);
    }
    return { width: size.width, height: size.height };
  }
}
