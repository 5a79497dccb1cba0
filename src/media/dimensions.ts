import type { ImageDecoder, VideoProber } from "./capabilities";
import { MediaProbeError } from "./errors";
import type { MediaDimensions } from "./types";

export class DimensionResolver {
  constructor(
    private readonly decoder: ImageDecoder,
    private readonly prober: VideoProber,
  ) {}

  async forImage(bytes: Uint8Array): Promise<MediaDimensions> {
    const { width, height } = await this.decoder.decode(bytes);
    return { width, height };
  }

  /** Needs a local path; in-memory media cannot be probed. */
  async forVideo(path: string | undefined): Promise<MediaDimensions> {
    if (!path) {
      throw new MediaProbeError("Video dimensions require a local file path");
    }
    const { width, height } = await this.prober.probe(path);
    return { width, height };
  }

  resolve(params: {
    isVideo: boolean;
    bytes: Uint8Array;
    path?: string;
  }): Promise<MediaDimensions> {
    return params.isVideo ? this.forVideo(params.path) : this.forImage(params.bytes);
  }
}
