import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { mirrorFilePath, serializeJsonl, subjectFilePath, writeJsonl } from './storage.js';

function mkTmpDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'arxiv-daily-jsonl-test-'));
}

const papers = [
  { id: 'a', title: 'Über Typen', authors: ['Zoë'] },
  { id: 'b', title: 'Second', authors: [] },
  { id: 'c', title: null, authors: ['X', 'Y'] },
];

describe('paths', () => {
  it('names subject files by subject and date', () => {
    expect(subjectFilePath('/data', 'cs.SE', '2024-01-02')).toBe(path.join('/data', 'cs.SE.2024-01-02.jsonl'));
  });

  it('defaults the mirror to today.jsonl', () => {
    expect(mirrorFilePath('/data')).toBe(path.join('/data', 'today.jsonl'));
    expect(mirrorFilePath('/data', 'latest.jsonl')).toBe(path.join('/data', 'latest.jsonl'));
  });
});

describe('serializeJsonl', () => {
  it('writes one compact object per line and keeps non-ASCII literal', () => {
    expect(serializeJsonl(papers.slice(0, 1))).toBe('{"id":"a","title":"Über Typen","authors":["Zoë"]}\n');
  });

  it('is empty for no items', () => {
    expect(serializeJsonl([])).toBe('');
  });
});

describe('writeJsonl', () => {
  it('writes N lines, each a standalone JSON object', () => {
    const file = path.join(mkTmpDir(), 'nested', 'cs.SE.2024-01-02.jsonl');
    expect(writeJsonl(file, papers, { overwrite: false })).toBe('written');

    const lines = fs.readFileSync(file, 'utf8').split('\n');
    expect(lines.pop()).toBe('');
    expect(lines).toHaveLength(3);
    expect(lines.map((l) => JSON.parse(l))).toEqual(papers);
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
  });

  it('leaves an existing file byte-for-byte untouched without overwrite', () => {
    const file = path.join(mkTmpDir(), 'cs.SE.2024-01-02.jsonl');
    fs.writeFileSync(file, 'previous run\n');

    expect(writeJsonl(file, papers, { overwrite: false })).toBe('skipped');
    expect(fs.readFileSync(file, 'utf8')).toBe('previous run\n');
  });

  it('replaces an existing file with overwrite', () => {
    const file = path.join(mkTmpDir(), 'today.jsonl');
    fs.writeFileSync(file, 'previous run\n');

    expect(writeJsonl(file, papers.slice(1, 2), { overwrite: true })).toBe('written');
    expect(fs.readFileSync(file, 'utf8')).toBe('{"id":"b","title":"Second","authors":[]}\n');
  });
});
