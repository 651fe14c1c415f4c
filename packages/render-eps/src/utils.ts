/**
 * Escape text for a PostScript string literal. Bytes outside printable
 * ASCII are written as octal escapes of their UTF-8 encoding.
 */
export function psString(text: string): string {
  let out = "";
  for (const byte of Buffer.from(text, "utf8")) {
    if (byte === 0x28 || byte === 0x29 || byte === 0x5c) {
      // ( ) \
      out += "\\" + String.fromCharCode(byte);
    } else if (byte < 0x20 || byte > 0x7e) {
      out += "\\" + byte.toString(8).padStart(3, "0");
    } else {
      out += String.fromCharCode(byte);
    }
  }
  return `(${out})`;
}

/** DSC comment values must stay on one line. */
export function dscValue(text: string): string {
  return text.replace(/[\r\n]+/g, " ");
}
