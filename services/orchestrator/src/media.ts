import { extname } from "node:path";

import type { MediaKind } from "./types.js";

const EXTENSIONS: Record<MediaKind, readonly string[]> = {
  image: ["jpg", "jpeg", "png", "bmp", "tiff"],
  video: ["mp4", "avi", "mov", "mkv", "webm"],
  audio: ["mp3", "wav", "ogg", "flac", "m4a"],
  document: ["pdf", "doc", "docx", "txt", "tif"],
};

export const MEDIA_KINDS: readonly MediaKind[] = ["image", "video", "audio", "document"];

export function isMediaKind(value: string): value is MediaKind {
  return MEDIA_KINDS.some((kind) => kind === value);
}

/** Media kind implied by the filename extension, or undefined when unsupported. */
export function detectMediaKind(filename: string): MediaKind | undefined {
  const extension = extname(filename).slice(1).toLowerCase();
  if (!extension) {
    return undefined;
  }
  return MEDIA_KINDS.find((kind) => EXTENSIONS[kind].includes(extension));
}
