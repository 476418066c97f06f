/**
 * fetch-daily — dump the latest day of arXiv listings per subject as JSONL
 *
 * Usage:
 *   npm run fetch-daily
 *   npm run fetch-daily -- --subject cs.SE --subject cs.PL
 *   npm run fetch-daily -- --max-results 50 --out ./data --overwrite
 *   npm run fetch-daily -- --config ./other.yml --json
 *
 * Options:
 *   --config <path>      Config file (default ./config.yml)
 *   --subject <code>     Subject to fetch; repeatable, replaces config subjects
 *   --max-results <n>    Page size per subject (1–2000)
 *   --out <dir>          Output directory (overrides storage.root)
 *   --overwrite          Replace existing <subject>.<date>.jsonl files
 *   --json               Print the run summary as one JSON line
 *
 * Exit codes:
 *   0  Run completed (per-subject failures are reported, not fatal)
 *   1  Usage or config error
 */

import path from 'node:path';

import { loadConfig, withOverrides, type ConfigOverrides } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { runFetchDaily } from '../lib/runners/fetch-daily.js';
import type { AppConfig } from '../lib/types.js';

// ─── Arg parsing ──────────────────────────────────────────────────────────────

interface Args {
  configPath: string | undefined;
  overrides: ConfigOverrides;
  json: boolean;
}

function parseArgs(argv: string[]): Args {
  let configPath: string | undefined;
  const subjects: string[] = [];
  const overrides: ConfigOverrides = {};
  let json = false;

  const value = (i: number, flag: string): string => {
    const v = argv[i];
    if (v === undefined) throw new Error(`${flag} requires a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--json' || arg === '-j') {
      json = true;
    } else if (arg === '--overwrite') {
      overrides.overwriteExisting = true;
    } else if (arg === '--config' || arg === '-c') {
      configPath = value(++i, arg);
    } else if (arg === '--subject' || arg === '-s') {
      subjects.push(value(++i, arg));
    } else if (arg === '--out' || arg === '-o') {
      overrides.storageRoot = value(++i, arg);
    } else if (arg === '--max-results') {
      const n = parseInt(value(++i, arg), 10);
      if (isNaN(n) || n < 1 || n > 2000) throw new Error('--max-results must be between 1 and 2000');
      overrides.maxResults = n;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (subjects.length > 0) overrides.subjects = subjects;
  return { configPath, overrides, json };
}

// ─── Main ─────────────────────────────────────────────────────────────────────

const repoRoot = path.resolve(process.cwd());

let args: Args;
let config: AppConfig;
try {
  args = parseArgs(process.argv.slice(2));
  const configPath = args.configPath ? path.resolve(args.configPath) : undefined;
  config = withOverrides(loadConfig(repoRoot, configPath), args.overrides);
} catch (err) {
  console.error(errorMessage(err));
  process.exit(1);
}

const res = await runFetchDaily({ config });
const { stats } = res;

if (args.json) {
  console.log(JSON.stringify({ kind: 'fetchDaily', status: res.status, stats, outcomes: res.outcomes }));
} else {
  if (res.status === 'warn') {
    console.warn(`Fetch completed with ${stats.failed} failed subject(s).`);
  }
  console.log(
    `Fetch OK. Subjects: ${stats.subjects}. Papers saved: ${stats.savedPapers}. Skipped: ${stats.skippedFiles}. Failed: ${stats.failed}.`,
  );
}
