import { describe, expect, it } from "vitest";
import { ImageDecodeError } from "../media/errors";
import { ImageSizeDecoder } from "./image-size-decoder";

function pngHeader(width: number, height: number): Uint8Array {
  const buffer = Buffer.alloc(33);
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buffer, 0);
  buffer.writeUInt32BE(13, 8);
  buffer.write("IHDR", 12, "ascii");
  buffer.writeUInt32BE(width, 16);
  buffer.writeUInt32BE(height, 20);
  return new Uint8Array(buffer);
}

function gifHeader(width: number, height: number): Uint8Array {
  const buffer = Buffer.alloc(13);
  buffer.write("GIF89a", 0, "ascii");
  buffer.writeUInt16LE(width, 6);
  buffer.writeUInt16LE(height, 8);
  return new Uint8Array(buffer);
}

describe("ImageSizeDecoder", () => {
  const decoder = new ImageSizeDecoder();

  it("reads PNG dimensions from the header", async () => {
    await expect(decoder.decode(pngHeader(640, 480))).resolves.toEqual({ width: 640, height: 480 });
  });

  it("reads GIF dimensions from the header", async () => {
    await expect(decoder.decode(gifHeader(32, 16))).resolves.toEqual({ width: 32, height: 16 });
  });

  it("honours the view offset of the byte array", async () => {
    const png = pngHeader(12, 34);
    const padded = new Uint8Array(png.byteLength + 5);
    padded.set(png, 5);
    await expect(decoder.decode(padded.subarray(5))).resolves.toEqual({ width: 12, height: 34 });
  });

  it("rejects data that is not an image", async () => {
    const error = await decoder.decode(new Uint8Array([1, 2, 3, 4, 5, 6])).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ImageDecodeError);
    expect(error).toMatchObject({ code: "IMAGE_DECODE_FAILED" });
  });
});
