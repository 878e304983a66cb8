import { ContentItem, PublishOptions } from '../types';

/**
 * Whether a single item belongs in a published listing
 */
export function isPublishable(item: ContentItem, options: PublishOptions = {}): boolean {
  if (item.draft && !options.includeDrafts) {
    return false;
  }
  if (options.now && item.date.getTime() > options.now.getTime()) {
    return false;
  }
  return true;
}

/**
 * The items eligible for publication, newest first.
 *
 * Nothing is computed until the result is iterated, and every iteration
 * filters and sorts the input again, so the sequence can be walked any
 * number of times as long as `items` can. Items sharing a date keep their
 * input order.
 */
export function publishable(
  items: Iterable<ContentItem>,
  options: PublishOptions = {}
): Iterable<ContentItem> {
  return {
    *[Symbol.iterator]() {
      const eligible = Array.from(items).filter((item) => isPublishable(item, options));
      eligible.sort((a, b) => b.date.getTime() - a.date.getTime());
      yield* eligible;
    },
  };
}
