const DEFAULT_MIME = "application/octet-stream";

export function toDataUri(bytes: Uint8Array, mimeType = DEFAULT_MIME) {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString("base64")}`;
}

/**
 * Prepares job input for the wire: raw bytes become base64 data URIs, dates
 * become ISO strings, everything else passes through unchanged.
 */
export function encodeInput(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return toDataUri(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => encodeInput(item));
  }
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, encodeInput(item)]));
  }
  return value;
}
