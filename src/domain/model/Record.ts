/** A JSON scalar. */
export type JsonPrimitive = string | number | boolean | null;

/** Any value `JSON.parse` can produce. */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * One dataset record as read from a single JSONL line.
 *
 * Opaque at the reader level: any JSON value is a record, including scalars
 * and `null`. Validators decide what shape they accept.
 */
export type DatasetRecord = JsonValue;

/** A record paired with the 1-based physical line it was read from. */
export interface NumberedRecord {
  readonly lineNumber: number;
  readonly value: DatasetRecord;
  /** The line's JSON text as read, without surrounding whitespace. Written out unchanged. */
  readonly raw: string;
}

/** A single turn of a chat-formatted training example. */
export type ChatMessage = {
  readonly role: string;
  readonly content: string;
};

/** A record carrying an ordered `messages` conversation. Other keys are kept as-is. */
export type ChatRecord = JsonObject & {
  readonly messages: ChatMessage[];
};

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Name the JSON type of a value for diagnostics (`'array'` and `'null'` are distinguished from `'object'`). */
export function describeJsonType(value: JsonValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
