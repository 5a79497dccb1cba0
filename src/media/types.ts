export const MEDIA_SOURCES = ["photoGallery", "videoGallery", "camera"] as const;
export type MediaSource = (typeof MEDIA_SOURCES)[number];

export interface MediaDimensions {
  readonly width?: number;
  readonly height?: number;
}

export interface SelectedFile {
  /** Destination key, `{prefix}/{timestamp}[_{index}].{ext}` */
  readonly storagePath: string;
  /** Local path of the picked item; absent where the platform has none */
  readonly filePath?: string;
  readonly bytes: Uint8Array;
  readonly dimensions?: MediaDimensions;
  /** Carried through for callers; never computed here */
  readonly blurHash?: string;
}

/** A file that is already in memory, e.g. produced by an earlier upload widget. */
export interface UploadedFile {
  name?: string;
  bytes?: Uint8Array;
  height?: number;
  width?: number;
  blurHash?: string;
}
