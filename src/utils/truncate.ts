/**
 * Cut `text` to `limit` characters, appending `marker` when anything was dropped
 */
export function truncate(text: string, limit: number, marker: string): string {
  if (text.length <= limit) {
    return text;
  }
  return text.substring(0, limit) + marker;
}
