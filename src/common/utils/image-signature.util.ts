export type ImageMimeType = 'image/jpeg' | 'image/png';

/**
 * Magic number signatures for the accepted image formats
 */
const IMAGE_SIGNATURES: ReadonlyArray<readonly [ImageMimeType, Buffer]> = [
  ['image/jpeg', Buffer.from([0xff, 0xd8, 0xff])],
  ['image/png', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])],
];

// Anything shorter cannot be a real JPEG/PNG
const MIN_IMAGE_BYTES = 12;

// Extension used when storing a file of the detected type
export const IMAGE_EXTENSIONS: Record<ImageMimeType, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
};

/**
 * Detect JPEG/PNG content from its leading bytes. The client-supplied
 * MIME type is ignored.
 */
export function detectImageType(content: Buffer): ImageMimeType | null {
  if (content.length < MIN_IMAGE_BYTES) {
    return null;
  }

  const match = IMAGE_SIGNATURES.find(([, signature]) =>
    content.subarray(0, signature.length).equals(signature),
  );

  return match ? match[0] : null;
}
