export const NDJSON_MIME_TYPE = 'application/x-ndjson';

/** Extensions accepted as line-delimited JSON. */
const LINE_DELIMITED_EXTENSIONS: readonly string[] = ['jsonl', 'ndjson', 'jsonlines'];

/** Detect MIME type from a file name or path based on its extension. */
export function detectMimeType(fileNameOrPath: string): string {
  const name = fileNameOrPath.split(/[\\/]/).pop() ?? '';
  const ext = name.includes('.') ? name.split('.').pop()?.toLowerCase() : undefined;
  if (ext !== undefined && LINE_DELIMITED_EXTENSIONS.includes(ext)) {
    return NDJSON_MIME_TYPE;
  }
  switch (ext) {
    case 'json':
      return 'application/json';
    case 'csv':
      return 'text/csv';
    default:
      return 'text/plain';
  }
}

export function isLineDelimitedJson(fileNameOrPath: string): boolean {
  return detectMimeType(fileNameOrPath) === NDJSON_MIME_TYPE;
}
