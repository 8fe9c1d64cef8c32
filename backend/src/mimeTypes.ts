import path from "node:path";

export const ALLOWED_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".bmp"] as const;

export type ImageExtension = (typeof ALLOWED_IMAGE_EXTENSIONS)[number];

const MIME_TYPES: Record<ImageExtension, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
};

const DEFAULT_MIME_TYPE = "image/jpeg";

const isImageExtension = (value: string): value is ImageExtension =>
  (ALLOWED_IMAGE_EXTENSIONS as readonly string[]).includes(value);

/** Lowercased allowed extension of `filename`, or null. */
export const imageExtensionOf = (filename: string): ImageExtension | null => {
  const ext = path.extname(filename).toLowerCase();
  return isImageExtension(ext) ? ext : null;
};

export const mimeTypeFor = (filename: string): string => {
  const ext = imageExtensionOf(filename);
  return ext ? MIME_TYPES[ext] : DEFAULT_MIME_TYPE;
};
