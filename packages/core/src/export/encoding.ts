import { EncodingError } from "./errors.js";

// A high surrogate not followed by a low one, or a low one not preceded by a high one
const UNPAIRED_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Encode document text as UTF-8.
 * Unpaired surrogates would silently become U+FFFD, so they are rejected.
 */
export function encodeUtf8(text: string): Buffer {
  const match = UNPAIRED_SURROGATE.exec(text);
  if (match) {
    throw new EncodingError(
      `Document contains an unpaired UTF-16 surrogate at offset ${match.index}`,
      { offset: match.index },
    );
  }
  return Buffer.from(text, "utf8");
}
