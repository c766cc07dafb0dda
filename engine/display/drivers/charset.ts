/**
 * Byte encodings for character displays that do not speak UTF-8.
 */

const UNKNOWN = 0x3f; // '?'

/** Code page 866, the Cyrillic table found on most customer-display VFDs. */
export function encodeCp866(text: string): Buffer {
  const bytes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? UNKNOWN;
    if (code < 0x80) {
      bytes.push(code);
    } else if (code >= 0x0410 && code <= 0x043f) {
      // А..Я а..п
      bytes.push(code - 0x0410 + 0x80);
    } else if (code >= 0x0440 && code <= 0x044f) {
      // р..я
      bytes.push(code - 0x0440 + 0xe0);
    } else if (code === 0x0401) {
      bytes.push(0xf0); // Ё
    } else if (code === 0x0451) {
      bytes.push(0xf1); // ё
    } else if (code === 0x00b0) {
      bytes.push(0xf8); // °
    } else {
      bytes.push(UNKNOWN);
    }
  }
  return Buffer.from(bytes);
}

/** HD44780 ROM A00 carries ASCII only; everything else shows as '?'. */
export function encodeAscii(text: string): number[] {
  const codes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? UNKNOWN;
    codes.push(code < 0x80 ? code : UNKNOWN);
  }
  return codes;
}
