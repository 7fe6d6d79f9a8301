import type { Metadata, MetadataInput } from "./types.js";

// Data-store attributes travel as one header per key: `X-Datastore-<key>: <value>`.
export const METADATA_HEADER_PREFIX = "X-Datastore-";

const PREFIX_LOWER = METADATA_HEADER_PREFIX.toLowerCase();

export function encodeMetadataHeaders(metadata: MetadataInput | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  if (!metadata) return headers;
  for (const [key, value] of Object.entries(metadata)) {
    if (!key) throw new Error("metadata keys must be non-empty");
    headers[`${METADATA_HEADER_PREFIX}${key}`] = String(value);
  }
  return headers;
}

/**
 * Collect the prefixed headers of a response into a flat mapping.
 *
 * Fetch lowercases header names and joins repeated headers with ", ", so keys
 * come back lowercase and a repeated header yields its joined value.
 */
export function decodeMetadataHeaders(headers: Headers): Metadata {
  const metadata: Metadata = {};
  headers.forEach((value, name) => {
    const lower = name.toLowerCase();
    if (!lower.startsWith(PREFIX_LOWER)) return;
    const key = lower.slice(PREFIX_LOWER.length);
    if (!key) return;
    metadata[key] = value;
  });
  return metadata;
}
