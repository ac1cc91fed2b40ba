/**
 * Parameter payload encoding.
 *
 * The payload is UTF-8 text: `name:value` entries sorted by name and
 * joined with `;`. Values use the same rendering as validation messages,
 * so `{ z: 0.5, x: 1 }` encodes as `x:1.0;z:0.5`.
 */

import { EncodingError } from "@vagus/codec";
import { formatNumber } from "@vagus/schema";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function encodeParams(params: ReadonlyMap<string, number>): Uint8Array {
  const names = [...params.keys()].sort();
  const entries: string[] = [];
  for (const name of names) {
    const value = params.get(name);
    if (value === undefined) continue;
    entries.push(`${name}:${formatNumber(value)}`);
  }
  return encoder.encode(entries.join(";"));
}

/**
 * Inverse of {@link encodeParams}.
 *
 * @throws {EncodingError} INVALID_TEXT for bytes that are not UTF-8,
 *   INVALID_BYTES for an entry that is not `name:number`,
 *   DUPLICATE_KEY for a name that appears twice
 */
export function decodeParams(bytes: Uint8Array): Map<string, number> {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch (error) {
    throw new EncodingError(
      "INVALID_TEXT",
      `Parameter payload is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const params = new Map<string, number>();
  if (text === "") return params;

  for (const entry of text.split(";")) {
    const separator = entry.lastIndexOf(":");
    const name = entry.slice(0, separator);
    const raw = entry.slice(separator + 1);
    const value = Number(raw);

    if (separator <= 0 || raw.trim() === "" || !Number.isFinite(value)) {
      throw new EncodingError("INVALID_BYTES", `Malformed parameter entry: ${entry}`);
    }
    if (params.has(name)) {
      throw new EncodingError("DUPLICATE_KEY", `Duplicate parameter: ${name}`);
    }
    params.set(name, value);
  }

  return params;
}
