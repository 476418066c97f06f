import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { request } from 'undici';

import { FeedParseError, FetchError, errorMessage } from './errors.js';
import type { PaperRecord } from './types.js';

export const ARXIV_API_URL = 'https://export.arxiv.org/api/query';
export const DEFAULT_MAX_RESULTS = 100;
export const PDF_MEDIA_TYPE = 'application/pdf';

const USER_AGENT = 'arxiv-daily-jsonl/0.1';

export interface FetchOptions {
  baseUrl?: string;
  maxResults?: number;
  start?: number;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  // keep ids and dates as strings, never coerce "2024" into a number
  parseTagValue: false,
  // <atom:feed> and <feed xmlns="..."> read the same
  removeNSPrefix: true,
});

const PREDEFINED_ENTITIES = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);

// Characters that must stay escaped when a character reference is inlined.
const MARKUP_ESCAPES = new Map([
  ['&', '&amp;'],
  ['<', '&lt;'],
  ['>', '&gt;'],
  ['"', '&quot;'],
  ["'", '&apos;'],
]);

// CDATA sections, comments and the DOCTYPE carry no references to resolve.
const OPAQUE = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<!DOCTYPE(?:[^[>]|\[[\s\S]*?\])*>/g;
const REFERENCE = /&(?:#([0-9]+)|#x([0-9a-fA-F]+)|([A-Za-z_:][\w.:-]*))?(;?)/g;
const ENTITY_DECL = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)/g;

type XmlNode = Record<string, unknown>;

function isNode(x: unknown): x is XmlNode {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function asArray(x: unknown): unknown[] {
  if (x === undefined || x === null) return [];
  return Array.isArray(x) ? x : [x];
}

// Element text, or null when the element is missing. Elements with attributes
// come back as objects holding their content under #text.
function optionalText(x: unknown): string | null {
  const first = Array.isArray(x) ? x[0] : x;
  if (typeof first === 'string') return first;
  if (isNode(first)) {
    const inner = first['#text'];
    return typeof inner === 'string' ? inner : '';
  }
  return null;
}

function attr(node: unknown, name: string): string | null {
  if (!isNode(node)) return null;
  const v = node[`@_${name}`];
  return typeof v === 'string' ? v : null;
}

function trimmed(s: string | null): string | null {
  return s === null ? null : s.trim();
}

export function buildQueryUrl(category: string, opts: FetchOptions = {}): string {
  const { baseUrl = ARXIV_API_URL, maxResults = DEFAULT_MAX_RESULTS, start = 0 } = opts;
  const params = new URLSearchParams({
    search_query: `cat:${category}`,
    start: String(start),
    max_results: String(maxResults),
    sortBy: 'lastUpdatedDate',
    sortOrder: 'descending',
  });
  return `${baseUrl}?${params.toString()}`;
}

/**
 * Fetches one page of a category's listing, newest update first, and returns
 * the raw Atom body. A single attempt with undici's default timeouts.
 */
export async function fetchAtom(category: string, opts: FetchOptions = {}): Promise<string> {
  if (!category.trim()) {
    throw new FetchError(category, 'category must be non-empty');
  }
  const url = buildQueryUrl(category, opts);

  let res: Awaited<ReturnType<typeof request>>;
  try {
    res = await request(url, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
    });
  } catch (err) {
    throw new FetchError(category, errorMessage(err), { cause: err });
  }

  const { statusCode, body } = res;
  if (statusCode < 200 || statusCode >= 300) {
    await body.dump();
    throw new FetchError(category, `HTTP ${statusCode}`, { status: statusCode });
  }
  return await body.text();
}

function parseEntry(e: unknown): PaperRecord {
  const entry = isNode(e) ? e : {};

  const authors: string[] = [];
  for (const a of asArray(entry.author)) {
    const name = isNode(a) ? optionalText(a.name) : null;
    if (name !== null) authors.push(name);
  }

  // last matching link wins
  let pdfUrl: string | null = null;
  for (const link of asArray(entry.link)) {
    if (attr(link, 'type') === PDF_MEDIA_TYPE) {
      pdfUrl = attr(link, 'href');
    }
  }

  return {
    id: optionalText(entry.id),
    title: trimmed(optionalText(entry.title)),
    summary: trimmed(optionalText(entry.summary)),
    published: optionalText(entry.published),
    updated: optionalText(entry.updated),
    authors,
    pdf_url: pdfUrl,
  };
}

function isXmlChar(cp: number): boolean {
  return (
    cp === 0x9 ||
    cp === 0xa ||
    cp === 0xd ||
    (cp >= 0x20 && cp <= 0xd7ff) ||
    (cp >= 0xe000 && cp <= 0xfffd) ||
    (cp >= 0x10000 && cp <= 0x10ffff)
  );
}

function position(xml: string, offset: number): { line: number; col: number } {
  const before = xml.slice(0, offset);
  return { line: before.split('\n').length, col: offset - before.lastIndexOf('\n') };
}

/**
 * Inlines numeric character references (&#233; &#xE9;) and rejects anything
 * that is not a well-formed reference: a bare "&", or a named entity that is
 * neither predefined nor declared in the DOCTYPE.
 */
function resolveReferences(xml: string): string {
  const declared = new Set<string>();
  for (const m of xml.matchAll(ENTITY_DECL)) declared.add(m[1]);

  const resolve = (segment: string, offset: number): string =>
    segment.replace(
      REFERENCE,
      (ref: string, dec: string | undefined, hex: string | undefined, name: string | undefined, semi: string, at: number) => {
        const fail = (msg: string): never => {
          throw new FeedParseError(msg, position(xml, offset + at));
        };
        if (semi !== ';' || (dec === undefined && hex === undefined && name === undefined)) {
          return fail('unescaped "&"');
        }
        if (name !== undefined) {
          return PREDEFINED_ENTITIES.has(name) || declared.has(name) ? ref : fail(`undefined entity ${ref}`);
        }
        const cp = dec !== undefined ? parseInt(dec, 10) : parseInt(hex ?? '', 16);
        if (!isXmlChar(cp)) return fail(`invalid character reference ${ref}`);
        const ch = String.fromCodePoint(cp);
        return MARKUP_ESCAPES.get(ch) ?? ch;
      },
    );

  let out = '';
  let last = 0;
  for (const m of xml.matchAll(OPAQUE)) {
    const at = m.index ?? last;
    out += resolve(xml.slice(last, at), last) + m[0];
    last = at + m[0].length;
  }
  return out + resolve(xml.slice(last), last);
}

/** Parses an Atom feed into records, one per <entry>, in document order. */
export function parseAtom(xml: string): PaperRecord[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new FeedParseError(valid.err.msg, { line: valid.err.line, col: valid.err.col });
  }

  const doc: unknown = parser.parse(resolveReferences(xml));
  const feed = isNode(doc) ? doc.feed : undefined;
  if (feed === undefined) {
    throw new FeedParseError('missing <feed> root element');
  }
  // <feed/> and <feed></feed> parse to an empty string
  if (!isNode(feed)) return [];

  return asArray(feed.entry).map(parseEntry);
}
