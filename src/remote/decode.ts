const decoder = new TextDecoder("utf-8", { fatal: false });

/**
 * Decode captured process output as UTF-8.
 * Malformed sequences become U+FFFD instead of failing the target.
 */
export function decodeOutput(bytes: Uint8Array | string | undefined): string {
  if (bytes === undefined) return "";
  if (typeof bytes === "string") return bytes;
  return decoder.decode(bytes);
}
