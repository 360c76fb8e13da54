/**
 * Minimal RSS 2.0 reader for Medium's public profile feed.
 */

import { XMLParser } from 'fast-xml-parser';
import type { ArticleSummary } from './types.js';

const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: '__cdata',
  textNodeName: '#text',
  parseTagValue: false,
  trimValues: true,
  removeNSPrefix: false,
  // Single-element lists still come back as arrays
  isArray: (name: string) => name === 'item' || name === 'category',
};

type FeedItem = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of a node that may be plain, CDATA-wrapped, or an element with attributes
 */
function extractText(value: unknown): string | undefined {
  if (typeof value === 'string' || typeof value === 'number') {
    return String(value).trim() || undefined;
  }
  if (!isRecord(value)) return undefined;

  const text = value.__cdata ?? value['#text'];
  return typeof text === 'string' || typeof text === 'number'
    ? String(text).trim() || undefined
    : undefined;
}

function parseDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

/**
 * Medium appends tracking parameters (?source=rss-...) to feed links
 */
function stripTracking(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.search = '';
    parsed.hash = '';
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Medium guids look like https://medium.com/p/<id>
 */
function extractPostId(guid: string | undefined, link: string): string {
  const source = guid ?? link;
  const match = /\/p\/([0-9a-f]+)\/?$/i.exec(source);
  if (match) return match[1];

  const lastSegment = stripTracking(source).replace(/\/+$/, '').split('/').pop();
  const suffix = lastSegment ? /-([0-9a-f]{8,})$/i.exec(lastSegment) : null;
  return suffix ? suffix[1] : source;
}

function toItems(parsed: unknown): FeedItem[] {
  if (!isRecord(parsed) || !isRecord(parsed.rss) || !isRecord(parsed.rss.channel)) {
    throw new Error('Invalid RSS feed: missing rss/channel element');
  }
  const items = parsed.rss.channel.item;
  if (items === undefined) return [];
  if (!Array.isArray(items)) {
    throw new Error('Invalid RSS feed: malformed item list');
  }
  return items.filter(isRecord);
}

/**
 * Parse an RSS document into article summaries, newest first as the feed orders them
 */
export function parseRssFeed(xml: string, limit?: number): ArticleSummary[] {
  const parser = new XMLParser(parserOptions);
  const items = toItems(parser.parse(xml));
  const selected = limit === undefined ? items : items.slice(0, limit);

  return selected.flatMap(item => {
    const title = extractText(item.title);
    const link = extractText(item.link);
    if (!title || !link) return [];

    const content = extractText(item['content:encoded']) ?? extractText(item.description);
    const summary: ArticleSummary = {
      id: extractPostId(extractText(item.guid), link),
      title,
      url: stripTracking(link),
      publishedAt: parseDate(extractText(item.pubDate)),
      tags: Array.isArray(item.category)
        ? item.category.map(extractText).filter((tag): tag is string => tag !== undefined)
        : [],
      ...(content !== undefined && { content, contentFormat: 'html' as const }),
    };
    return [summary];
  });
}
