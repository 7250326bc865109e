/**
 * Parses a JSON string or buffer.
 *
 * Automatically decodes a Uint8Array using UTF-8 if needed.
 *
 * @param rawContent - Raw JSON content as string or binary (Uint8Array).
 * @returns Parsed value.
 * @throws If the input is not valid JSON.
 */
export function parseJSON({ rawContent }: { rawContent: string | Uint8Array }): unknown {
  return JSON.parse(
    typeof rawContent === "string"
      ? rawContent
      : new TextDecoder().decode(rawContent)
  );
}
