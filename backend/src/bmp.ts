/**
 * BMP codec. Decodes uncompressed bitmaps (1/4/8-bit palette, 16/24/32-bit,
 * BI_RGB or BI_BITFIELDS) and encodes 24-bit bitmaps.
 * sharp's prebuilt libvips has no BMP loader or saver, so BMP uploads are
 * decoded to raw pixels here and handed to sharp, and written back here.
 */

export interface RawImage {
  width: number;
  height: number;
  channels: 3 | 4;
  /** Row-major, top-down, RGB or RGBA. */
  data: Buffer;
}

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const ALPHA_MASK_IN_HEADER_SIZE = 56;
const BI_RGB = 0;
const BI_BITFIELDS = 3;
const BI_ALPHABITFIELDS = 6;
// 72 DPI
const PIXELS_PER_METER = 2835;

const PALETTE_DEPTHS = new Set([1, 4, 8]);
const DIRECT_DEPTHS = new Set([16, 24, 32]);

const rowStride = (width: number, bitsPerPixel: number): number =>
  Math.floor((bitsPerPixel * width + 31) / 32) * 4;

export const isBmp = (bytes: Buffer): boolean =>
  bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;

interface ChannelMask {
  shift: number;
  max: number;
}

interface PixelMasks {
  red: ChannelMask;
  green: ChannelMask;
  blue: ChannelMask;
  alpha: ChannelMask | null;
}

const toChannelMask = (mask: number): ChannelMask | null => {
  let value = mask >>> 0;
  if (value === 0) return null;
  let shift = 0;
  while ((value & 1) === 0) {
    value >>>= 1;
    shift += 1;
  }
  return { shift, max: value };
};

const scaleChannel = (pixel: number, mask: ChannelMask): number =>
  Math.round((((pixel >>> mask.shift) & mask.max) * 255) / mask.max);

const DEFAULT_MASKS: Record<16 | 32, [number, number, number, number]> = {
  // X1R5G5B5
  16: [0x7c00, 0x03e0, 0x001f, 0],
  // B8G8R8A8 as stored
  32: [0x00ff0000, 0x0000ff00, 0x000000ff, 0xff000000],
};

const readMasks = (
  bytes: Buffer,
  headerSize: number,
  bitsPerPixel: 16 | 32,
  compression: number,
): PixelMasks | null => {
  let raw = DEFAULT_MASKS[bitsPerPixel];
  if (compression !== BI_RGB) {
    // Right after the 40-byte header, or the same bytes inside a V4/V5 header.
    const maskOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
    const withAlpha = compression === BI_ALPHABITFIELDS || headerSize >= ALPHA_MASK_IN_HEADER_SIZE;
    const maskCount = withAlpha ? 4 : 3;
    if (maskOffset + maskCount * 4 > bytes.length) return null;
    raw = [
      bytes.readUInt32LE(maskOffset),
      bytes.readUInt32LE(maskOffset + 4),
      bytes.readUInt32LE(maskOffset + 8),
      withAlpha ? bytes.readUInt32LE(maskOffset + 12) : 0,
    ];
  }

  const red = toChannelMask(raw[0]);
  const green = toChannelMask(raw[1]);
  const blue = toChannelMask(raw[2]);
  if (!red || !green || !blue) return null;
  return { red, green, blue, alpha: toChannelMask(raw[3]) };
};

const readPalette = (bytes: Buffer, headerSize: number, bitsPerPixel: number, pixelOffset: number): Buffer[] | null => {
  const declared = bytes.readUInt32LE(46);
  const count = declared === 0 ? 2 ** bitsPerPixel : declared;
  const start = FILE_HEADER_SIZE + headerSize;
  if (count > 2 ** bitsPerPixel || start + count * 4 > pixelOffset) return null;

  const palette: Buffer[] = [];
  for (let i = 0; i < count; i += 1) {
    const entry = start + i * 4;
    // stored as BGR0
    palette.push(Buffer.from([bytes[entry + 2], bytes[entry + 1], bytes[entry]]));
  }
  return palette;
};

export function decodeBmp(bytes: Buffer): RawImage | null {
  if (!isBmp(bytes) || bytes.length < FILE_HEADER_SIZE + INFO_HEADER_SIZE) return null;

  const pixelOffset = bytes.readUInt32LE(10);
  const headerSize = bytes.readUInt32LE(14);
  if (headerSize < INFO_HEADER_SIZE) return null;

  const width = bytes.readInt32LE(18);
  const rawHeight = bytes.readInt32LE(22);
  const planes = bytes.readUInt16LE(26);
  const bitsPerPixel = bytes.readUInt16LE(28);
  const compression = bytes.readUInt32LE(30);

  if (planes !== 1 || width <= 0 || rawHeight === 0) return null;
  if (!PALETTE_DEPTHS.has(bitsPerPixel) && !DIRECT_DEPTHS.has(bitsPerPixel)) return null;
  if (compression !== BI_RGB) {
    const bitfields = compression === BI_BITFIELDS || compression === BI_ALPHABITFIELDS;
    if (!bitfields || (bitsPerPixel !== 16 && bitsPerPixel !== 32)) return null;
  }

  const topDown = rawHeight < 0;
  const height = Math.abs(rawHeight);
  const stride = rowStride(width, bitsPerPixel);
  if (pixelOffset + stride * height > bytes.length) return null;

  let palette: Buffer[] | null = null;
  let masks: PixelMasks | null = null;
  if (PALETTE_DEPTHS.has(bitsPerPixel)) {
    palette = readPalette(bytes, headerSize, bitsPerPixel, pixelOffset);
    if (!palette) return null;
  } else if (bitsPerPixel === 16 || bitsPerPixel === 32) {
    masks = readMasks(bytes, headerSize, bitsPerPixel, compression);
    if (!masks) return null;
  }

  const channels = masks?.alpha ? 4 : 3;
  const data = Buffer.alloc(width * height * channels);

  for (let y = 0; y < height; y += 1) {
    const sourceRow = topDown ? y : height - 1 - y;
    const rowStart = pixelOffset + sourceRow * stride;
    for (let x = 0; x < width; x += 1) {
      const dst = (y * width + x) * channels;

      if (palette) {
        const bitOffset = x * bitsPerPixel;
        const byte = bytes[rowStart + (bitOffset >> 3)];
        // leftmost pixel in the high bits
        const index = (byte >> (8 - bitsPerPixel - (bitOffset & 7))) & ((1 << bitsPerPixel) - 1);
        const colour = palette[index];
        if (!colour) return null;
        colour.copy(data, dst);
      } else if (masks) {
        const src = rowStart + x * (bitsPerPixel / 8);
        const pixel = bitsPerPixel === 16 ? bytes.readUInt16LE(src) : bytes.readUInt32LE(src);
        data[dst] = scaleChannel(pixel, masks.red);
        data[dst + 1] = scaleChannel(pixel, masks.green);
        data[dst + 2] = scaleChannel(pixel, masks.blue);
        if (masks.alpha) {
          data[dst + 3] = scaleChannel(pixel, masks.alpha);
        }
      } else {
        const src = rowStart + x * 3;
        // stored as BGR
        data[dst] = bytes[src + 2];
        data[dst + 1] = bytes[src + 1];
        data[dst + 2] = bytes[src];
      }
    }
  }

  return { width, height, channels, data };
}

/** Encodes raw top-down pixels (1, 3 or 4 channels) as a bottom-up 24-bit BMP. */
export function encodeBmp(data: Buffer, width: number, height: number, channels: number): Buffer {
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new Error(`Unsupported channel count for BMP: ${channels}`);
  }

  const stride = rowStride(width, 24);
  const imageSize = stride * height;
  const pixelOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
  const out = Buffer.alloc(pixelOffset + imageSize);

  out.write("BM", 0, "ascii");
  out.writeUInt32LE(out.length, 2);
  out.writeUInt32LE(pixelOffset, 10);
  out.writeUInt32LE(INFO_HEADER_SIZE, 14);
  out.writeInt32LE(width, 18);
  out.writeInt32LE(height, 22);
  out.writeUInt16LE(1, 26);
  out.writeUInt16LE(24, 28);
  out.writeUInt32LE(BI_RGB, 30);
  out.writeUInt32LE(imageSize, 34);
  out.writeInt32LE(PIXELS_PER_METER, 38);
  out.writeInt32LE(PIXELS_PER_METER, 42);

  for (let y = 0; y < height; y += 1) {
    const rowStart = pixelOffset + (height - 1 - y) * stride;
    for (let x = 0; x < width; x += 1) {
      const src = (y * width + x) * channels;
      const dst = rowStart + x * 3;
      const r = data[src];
      const g = channels === 1 ? r : data[src + 1];
      const b = channels === 1 ? r : data[src + 2];
      out[dst] = b;
      out[dst + 1] = g;
      out[dst + 2] = r;
    }
  }

  return out;
}
