const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47] as const;

export type ImageMimeType = 'image/png' | 'image/jpeg';

/**
 * PNG when the leading bytes carry the PNG signature, JPEG otherwise.
 */
export function detectImageMimeType(image: Uint8Array): ImageMimeType {
  const isPng = PNG_MAGIC.every((byte, index) => image[index] === byte);
  return isPng ? 'image/png' : 'image/jpeg';
}

export function encodeImageBase64(image: Uint8Array): string {
  return Buffer.from(image).toString('base64');
}

export function toImageDataUrl(image: Uint8Array): string {
  return `data:${detectImageMimeType(image)};base64,${encodeImageBase64(image)}`;
}
