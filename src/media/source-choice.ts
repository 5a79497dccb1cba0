import type { SourceChoiceRequest } from "./capabilities";
import type { MediaSource } from "./types";

export interface SourceOption {
  label: string;
  source: MediaSource;
}

export interface SourceOptions {
  /** Only shown where a camera can be offered. */
  title?: string;
  options: SourceOption[];
}

export const SOURCE_CHOICE_TITLE = "Choose Source";

export function buildSourceOptions(request: SourceChoiceRequest): SourceOptions {
  const options: SourceOption[] = [];
  if (request.allowPhoto && request.allowVideo) {
    options.push(
      { label: "Gallery (Photo)", source: "photoGallery" },
      { label: "Gallery (Video)", source: "videoGallery" },
    );
  } else if (request.allowPhoto) {
    options.push({ label: "Gallery", source: "photoGallery" });
  } else {
    options.push({ label: "Gallery", source: "videoGallery" });
  }
  if (request.supportsCamera) {
    options.push({ label: "Camera", source: "camera" });
  }
  return {
    title: request.supportsCamera ? SOURCE_CHOICE_TITLE : undefined,
    options,
  };
}

export function isVideoSelection(params: {
  source: MediaSource;
  allowPhoto: boolean;
  allowVideo: boolean;
}): boolean {
  if (params.source === "videoGallery") {
    return true;
  }
  return params.source === "camera" && params.allowVideo && !params.allowPhoto;
}
