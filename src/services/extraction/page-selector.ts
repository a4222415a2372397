/**
 * Page Selector
 *
 * @module services/extraction/page-selector
 */

/**
 * Resolve a caller's page request against the document's page count.
 *
 * No request (or an empty one) means every page. Otherwise out-of-range entries
 * are dropped silently and the caller's order is kept, duplicates included.
 *
 * @param requested - 1-indexed page numbers
 * @param totalPages - Page count of the opened document
 */
export function resolvePages(requested: readonly number[] | undefined, totalPages: number): number[] {
  if (!requested || requested.length === 0) {
    return Array.from({ length: Math.max(0, totalPages) }, (_, i) => i + 1);
  }
  return requested.filter((page) => Number.isInteger(page) && page >= 1 && page <= totalPages);
}
