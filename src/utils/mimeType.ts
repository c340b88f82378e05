const MIME_TYPES_BY_EXTENSION: ReadonlyArray<[string, string]> = [
  [".jpg", "image/jpeg"],
  [".jpeg", "image/jpeg"],
  [".png", "image/png"],
  [".mp4", "video/mp4"],
];

export const DEFAULT_MIME_TYPE = "application/octet-stream";

/**
 * Guess a MIME type from a file name's extension
 *
 * @example mimeTypeFor("avatar.png") // "image/png"
 */
export function mimeTypeFor(fileName: string): string {
  for (const [extension, mimeType] of MIME_TYPES_BY_EXTENSION) {
    if (fileName.endsWith(extension)) {
      return mimeType;
    }
  }
  return DEFAULT_MIME_TYPE;
}
