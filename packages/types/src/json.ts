export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

/** String-keyed bag of JSON values stored alongside documents, files and chunks. */
export type MetadataMap = Record<string, JsonValue>;
