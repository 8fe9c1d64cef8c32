/**
 * Image Validator/Store
 * Validates uploaded bytes, normalizes colour mode, bounds the pixel size and
 * writes the result into the upload directory under a generated name.
 */

import { randomUUID } from "node:crypto";
import { access, mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";

import { decodeBmp, encodeBmp, isBmp } from "./bmp.js";
import { DEFAULT_MAX_IMAGE_DIMENSION, DEFAULT_MAX_UPLOAD_BYTES } from "./config.js";
import { imageExtensionOf, type ImageExtension } from "./mimeTypes.js";

// ============================================================================
// TYPES
// ============================================================================

export interface ImageStoreOptions {
  uploadDir: string;
  maxFileBytes?: number;
  maxDimension?: number;
}

export interface SavedImage {
  filename: string;
  path: string;
  sizeBytes: number;
  width: number;
  height: number;
}

interface DecodedImage {
  width: number;
  height: number;
  hasAlpha: boolean;
  isPalette: boolean;
  open: () => sharp.Sharp;
}

const DECODABLE_FORMATS = new Set<string>(["jpeg", "png", "webp"]);
const JPEG_QUALITY = 85;
const WEBP_QUALITY = 85;

// ============================================================================
// STORE
// ============================================================================

export class ImageStore {
  readonly uploadDir: string;
  readonly maxFileBytes: number;
  readonly maxDimension: number;

  constructor(options: ImageStoreOptions) {
    this.uploadDir = path.resolve(options.uploadDir);
    this.maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
    this.maxDimension = options.maxDimension ?? DEFAULT_MAX_IMAGE_DIMENSION;
  }

  async validate(bytes: Buffer, filename: string): Promise<boolean> {
    if (bytes.length > this.maxFileBytes) {
      console.warn(`[ImageStore] Rejected ${filename}: ${bytes.length} bytes exceeds ${this.maxFileBytes}`);
      return false;
    }
    if (!imageExtensionOf(filename)) {
      console.warn(`[ImageStore] Rejected ${filename}: extension not allowed`);
      return false;
    }
    if (!(await this.decode(bytes))) {
      console.warn(`[ImageStore] Rejected ${filename}: content is not a decodable image`);
      return false;
    }
    return true;
  }

  async save(bytes: Buffer, originalFilename: string): Promise<SavedImage> {
    const ext = imageExtensionOf(originalFilename);
    if (!ext) {
      throw new Error(`Unsupported image extension: ${originalFilename}`);
    }
    const decoded = await this.decode(bytes);
    if (!decoded) {
      throw new Error(`Image could not be decoded: ${originalFilename}`);
    }

    let pipeline = decoded.open();
    if (decoded.hasAlpha || decoded.isPalette) {
      pipeline = pipeline.removeAlpha();
    }
    if (decoded.width > this.maxDimension || decoded.height > this.maxDimension) {
      pipeline = pipeline.resize({
        width: this.maxDimension,
        height: this.maxDimension,
        fit: "inside",
        kernel: sharp.kernel.lanczos3,
        withoutEnlargement: true,
      });
    }

    const encoded = await encode(pipeline, ext);
    const filename = `${randomUUID()}${ext}`;
    const filePath = path.join(this.uploadDir, filename);

    await mkdir(this.uploadDir, { recursive: true });
    await writeFile(filePath, encoded.data);

    return {
      filename,
      path: filePath,
      sizeBytes: encoded.data.length,
      width: encoded.width,
      height: encoded.height,
    };
  }

  /** Path of `filename` inside the upload directory, or null if it is not there. */
  async resolvePath(filename: string): Promise<string | null> {
    const candidate = path.resolve(this.uploadDir, filename);
    if (path.dirname(candidate) !== this.uploadDir) {
      return null;
    }
    try {
      await access(candidate);
      return candidate;
    } catch {
      return null;
    }
  }

  /** Removes the file; a missing file counts as deleted. */
  async delete(filePath: string): Promise<boolean> {
    try {
      await rm(filePath, { force: true });
      return true;
    } catch (error) {
      console.warn(`[ImageStore] Failed to delete ${filePath}:`, error instanceof Error ? error.message : error);
      return false;
    }
  }

  private async decode(bytes: Buffer): Promise<DecodedImage | null> {
    if (bytes.length === 0) return null;

    if (isBmp(bytes)) {
      const raw = decodeBmp(bytes);
      if (!raw) return null;
      return {
        width: raw.width,
        height: raw.height,
        hasAlpha: raw.channels === 4,
        isPalette: false,
        open: () => sharp(raw.data, { raw: { width: raw.width, height: raw.height, channels: raw.channels } }),
      };
    }

    try {
      const metadata = await sharp(bytes).metadata();
      if (!metadata.format || !DECODABLE_FORMATS.has(metadata.format)) return null;
      if (!metadata.width || !metadata.height) return null;
      // Headers alone pass for truncated files; decode every pixel.
      await sharp(bytes).raw().toBuffer();
      return {
        width: metadata.width,
        height: metadata.height,
        hasAlpha: metadata.hasAlpha ?? false,
        isPalette: metadata.isPalette,
        open: () => sharp(bytes),
      };
    } catch {
      return null;
    }
  }
}

async function encode(
  pipeline: sharp.Sharp,
  ext: ImageExtension,
): Promise<{ data: Buffer; width: number; height: number }> {
  if (ext === ".bmp") {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return { data: encodeBmp(data, info.width, info.height, info.channels), width: info.width, height: info.height };
  }

  const formatted =
    ext === ".png"
      ? pipeline.png({ palette: false })
      : ext === ".webp"
        ? pipeline.webp({ quality: WEBP_QUALITY })
        : pipeline.jpeg({ quality: JPEG_QUALITY });

  const { data, info } = await formatted.toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height };
}
