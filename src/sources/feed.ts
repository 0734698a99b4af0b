import type { FeedItem } from './types';

/**
 * Platforms list newest first with pinned items on top; feeds are kept
 * oldest first. Items without a timestamp keep their relative position.
 */
export function sortOldestFirst(items: FeedItem[]): FeedItem[] {
  const reversed = [...items].reverse();
  return reversed
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      if (a.item.publishedAt && b.item.publishedAt) {
        const diff =
          Date.parse(a.item.publishedAt) - Date.parse(b.item.publishedAt);
        if (diff !== 0) return diff;
      }
      return a.index - b.index;
    })
    .map(({ item }) => item);
}
