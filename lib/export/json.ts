// lib/export/json.ts

export function toJson(data: unknown, pretty = false): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}
