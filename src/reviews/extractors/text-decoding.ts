interface LegacyEncoding {
  label: string;
  // Byte values the WHATWG decoder passes through as C1 controls but the code page leaves undefined.
  undefinedCodePoints: RegExp;
}

const LEGACY_ENCODINGS: LegacyEncoding[] = [
  { label: "windows-1251", undefinedCodePoints: /\u0098/ },
  { label: "windows-1252", undefinedCodePoints: /[\u0081\u008d\u008f\u0090\u009d]/ },
];

/**
 * Decodes an uploaded text file: strict UTF-8, then windows-1251, then
 * windows-1252, then latin1, which maps every byte.
 */
export function decodeReviewText(buffer: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    // not UTF-8, try the legacy code pages
  }
  for (const encoding of LEGACY_ENCODINGS) {
    const text = new TextDecoder(encoding.label).decode(buffer);
    if (!encoding.undefinedCodePoints.test(text)) {
      return text;
    }
  }
  return buffer.toString("latin1");
}
