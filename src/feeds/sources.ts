/**
 * Current Affairs Digest — Feed Sources
 *
 * Outlets and their RSS feeds, fetched in this order.
 */

import type { FeedSourceConfig } from '../types';

export const FEEDS: readonly FeedSourceConfig[] = [
  {
    name: 'Dawn',
    // Main feed: politics, business and the rest
    urls: ['https://www.dawn.com/feeds/home'],
  },
  {
    name: 'The Express Tribune',
    urls: [
      'https://tribune.com.pk/feed/latest',
      'https://tribune.com.pk/feed/opinion',
    ],
  },
];
