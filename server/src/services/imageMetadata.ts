/**
 * Image header sniffing for response metadata.
 *
 * Reads pixel dimensions from PNG, GIF and baseline/progressive JPEG headers
 * without decoding the image. Anything else reports "unknown".
 */

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

interface Dimensions {
  width: number;
  height: number;
}

function pngSize(bytes: Buffer): Dimensions | null {
  if (bytes.length < 24 || !bytes.subarray(0, 8).equals(PNG_SIGNATURE)) {
    return null;
  }
  // IHDR is always the first chunk
  return { width: bytes.readUInt32BE(16), height: bytes.readUInt32BE(20) };
}

function gifSize(bytes: Buffer): Dimensions | null {
  if (bytes.length < 10 || bytes.toString("ascii", 0, 4) !== "GIF8") {
    return null;
  }
  return { width: bytes.readUInt16LE(6), height: bytes.readUInt16LE(8) };
}

function isStartOfFrame(marker: number): boolean {
  // SOF0..SOF15, excluding DHT (C4), JPG (C8) and DAC (CC)
  return (
    marker >= 0xc0 &&
    marker <= 0xcf &&
    marker !== 0xc4 &&
    marker !== 0xc8 &&
    marker !== 0xcc
  );
}

function jpegSize(bytes: Buffer): Dimensions | null {
  if (bytes.length < 4 || bytes[0] !== 0xff || bytes[1] !== 0xd8) {
    return null;
  }

  let offset = 2;
  while (offset + 4 <= bytes.length) {
    if (bytes[offset] !== 0xff) {
      return null;
    }
    const marker = bytes[offset + 1];
    if (marker === 0xff) {
      // fill byte
      offset++;
      continue;
    }
    const segmentLength = bytes.readUInt16BE(offset + 2);
    if (isStartOfFrame(marker)) {
      if (offset + 9 > bytes.length) {
        return null;
      }
      return {
        height: bytes.readUInt16BE(offset + 5),
        width: bytes.readUInt16BE(offset + 7),
      };
    }
    offset += 2 + segmentLength;
  }

  return null;
}

/**
 * Return "WIDTHxHEIGHT" for a recognized image header, else "unknown".
 */
export function readImageSize(bytes: Buffer): string {
  const size = pngSize(bytes) ?? gifSize(bytes) ?? jpegSize(bytes);
  return size ? `${size.width}x${size.height}` : "unknown";
}
