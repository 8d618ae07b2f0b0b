import type { JsonValue, MetadataMap } from "@docboard/types";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function mergeMetadata(current: MetadataMap, patch: MetadataMap): MetadataMap {
  return { ...current, ...patch };
}

export function isoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function readString(metadata: MetadataMap, key: string): string | null {
  const value: JsonValue | undefined = metadata[key];
  return typeof value === "string" ? value : null;
}
