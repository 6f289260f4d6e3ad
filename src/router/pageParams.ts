/** `/pages/:pageNumber` param → 1-based page number; anything else falls back. */
export function parsePageNumber(raw: string | undefined, fallback = 1): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}
