import type { AppConfig, PaperRecord } from '../types.js';
import { fetchAtom, parseAtom, type FetchOptions } from '../arxiv.js';
import { SubjectRunError, type RunStage } from '../errors.js';
import { filterByDate, latestUpdatedDate } from '../select.js';
import { ensureDir, mirrorFilePath, subjectFilePath, writeJsonl } from '../storage.js';

export type FeedFetcher = (category: string, opts: FetchOptions) => Promise<string>;
export type FeedParser = (xml: string) => PaperRecord[];

export interface FetchDailyOptions {
  config: AppConfig;
  fetchFeed?: FeedFetcher; // default: fetchAtom
  parseFeed?: FeedParser; // default: parseAtom
}

interface WrittenOutcome {
  subject: string;
  date: string;
  path: string;
  count: number;
  mirrored: boolean;
}

export type SubjectOutcome =
  | ({ status: 'saved' } & WrittenOutcome)
  | ({ status: 'skipped-existing' } & WrittenOutcome)
  | { status: 'empty'; subject: string }
  | { status: 'no-date'; subject: string; fetched: number }
  | { status: 'failed'; subject: string; stage: RunStage; error: string };

export interface FetchDailyStats {
  subjects: number;
  fetchedEntries: number;
  savedPapers: number;
  savedFiles: number;
  skippedFiles: number;
  failed: number;
  startedAt: string;
  finishedAt: string;
}

export interface FetchDailyResult {
  status: 'ok' | 'warn';
  outcomes: SubjectOutcome[];
  stats: FetchDailyStats;
}

async function stage<T>(subject: string, name: RunStage, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    throw new SubjectRunError(subject, name, e);
  }
}

async function processSubject(
  subject: string,
  config: AppConfig,
  fetchFeed: FeedFetcher,
  parseFeed: FeedParser,
  stats: FetchDailyStats,
): Promise<SubjectOutcome> {
  const xml = await stage(subject, 'fetch', () => fetchFeed(subject, config.fetch));
  const records = await stage(subject, 'parse', () => parseFeed(xml));
  stats.fetchedEntries += records.length;

  if (records.length === 0) {
    console.log(`${subject} → no papers found`);
    return { status: 'empty', subject };
  }

  const date = latestUpdatedDate(records);
  if (date === null) {
    console.log(`${subject} → ${records.length} papers but none has an updated date`);
    return { status: 'no-date', subject, fetched: records.length };
  }

  const papers = filterByDate(records, date);
  const root = config.storage.root;
  const outPath = subjectFilePath(root, subject, date);

  const written = await stage(subject, 'write', () =>
    writeJsonl(outPath, papers, { overwrite: config.output.overwriteExisting }),
  );
  if (written === 'written') {
    console.log(`Saved ${papers.length} papers to ${outPath}`);
  } else {
    console.log(`${outPath} already exists, skipping`);
  }

  const { mirror } = config.output;
  if (mirror.enabled) {
    const mirrorPath = mirrorFilePath(root, mirror.fileName);
    await stage(subject, 'write', () => writeJsonl(mirrorPath, papers, { overwrite: true }));
    console.log(`Saved ${papers.length} papers to ${mirrorPath}`);
  }

  // counted once the mirror is written as well
  if (written === 'written') {
    stats.savedFiles += 1;
    stats.savedPapers += papers.length;
  } else {
    stats.skippedFiles += 1;
  }

  return {
    status: written === 'written' ? 'saved' : 'skipped-existing',
    subject,
    date,
    path: outPath,
    count: papers.length,
    mirrored: mirror.enabled,
  };
}

/**
 * Fetches every configured subject in order and dumps the most recent update
 * day of each as `<root>/<subject>.<date>.jsonl`. A failing subject is logged
 * and recorded; the remaining subjects still run.
 */
export async function runFetchDaily(opts: FetchDailyOptions): Promise<FetchDailyResult> {
  const { config, fetchFeed = fetchAtom, parseFeed = parseAtom } = opts;

  ensureDir(config.storage.root);

  const stats: FetchDailyStats = {
    subjects: config.subjects.length,
    fetchedEntries: 0,
    savedPapers: 0,
    savedFiles: 0,
    skippedFiles: 0,
    failed: 0,
    startedAt: new Date().toISOString(),
    finishedAt: '',
  };
  const outcomes: SubjectOutcome[] = [];

  for (const subject of config.subjects) {
    try {
      outcomes.push(await processSubject(subject, config, fetchFeed, parseFeed, stats));
    } catch (e) {
      if (!(e instanceof SubjectRunError)) throw e;
      console.warn(e.message);
      stats.failed += 1;
      outcomes.push({ status: 'failed', subject, stage: e.stage, error: e.message });
    }
  }

  stats.finishedAt = new Date().toISOString();
  return { status: stats.failed > 0 ? 'warn' : 'ok', outcomes, stats };
}
