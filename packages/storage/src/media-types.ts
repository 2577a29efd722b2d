export const DEFAULT_MEDIA_TYPE = "application/octet-stream";

const MEDIA_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".txt": "text/plain",
  ".text": "text/plain",
  ".md": "text/markdown",
  ".markdown": "text/markdown",
  ".csv": "text/csv",
  ".html": "text/html",
  ".htm": "text/html",
  ".json": "application/json",
  ".xml": "application/xml",
};

/** Lower-cased extension including the dot, or "" when the key has none. */
export function extensionOf(key: string): string {
  const name = key.slice(key.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  return dot <= 0 ? "" : name.slice(dot).toLowerCase();
}

export function mediaTypeFor(key: string): string {
  return MEDIA_TYPES[extensionOf(key)] ?? DEFAULT_MEDIA_TYPE;
}
