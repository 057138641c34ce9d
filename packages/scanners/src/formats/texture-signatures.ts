/**
 * Leading bytes expected for each texture extension. An extension maps to
 * several alternatives when the format has more than one valid prefix; an
 * empty list accepts any content (TGA has no magic number).
 */
export const TEXTURE_SIGNATURES: Readonly<Record<string, readonly (readonly number[])[]>> = {
  jpg: [[0xff, 0xd8]],
  jpeg: [[0xff, 0xd8]],
  png: [[0x89, 0x50, 0x4e, 0x47]],
  bmp: [[0x42, 0x4d]],
  tif: [
    [0x49, 0x49, 0x2a, 0x00],
    [0x4d, 0x4d, 0x00, 0x2a],
  ],
  tiff: [
    [0x49, 0x49, 0x2a, 0x00],
    [0x4d, 0x4d, 0x00, 0x2a],
  ],
  exr: [[0x76, 0x2f, 0x31, 0x01]],
  hdr: [[0x23, 0x3f]],
  tga: [],
};

export const TEXTURE_PREFIX_LENGTH = 16;

/**
 * Whether `prefix` starts with a signature registered for `extension`.
 * Extensions without an entry are not judged and return true.
 */
export function matchesTextureSignature(extension: string, prefix: Buffer): boolean {
  const signatures = TEXTURE_SIGNATURES[extension];
  if (!signatures || signatures.length === 0) return true;

  return signatures.some(
    (signature) =>
      prefix.length >= signature.length &&
      signature.every((byte, index) => prefix[index] === byte),
  );
}
