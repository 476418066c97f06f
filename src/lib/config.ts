import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { ARXIV_API_URL, DEFAULT_MAX_RESULTS } from './arxiv.js';
import { DEFAULT_MIRROR_FILE } from './storage.js';
import type { AppConfig } from './types.js';

const AppConfigSchema = z.object({
  subjects: z.array(z.string().trim().min(1)).min(1),
  storage: z.object({
    root: z.string().min(1),
  }),
  fetch: z
    .object({
      baseUrl: z.string().url().default(ARXIV_API_URL),
      maxResults: z.number().int().min(1).max(2000).default(DEFAULT_MAX_RESULTS),
      start: z.number().int().min(0).default(0),
    })
    .default({}),
  output: z
    .object({
      overwriteExisting: z.boolean().default(false),
      mirror: z
        .object({
          enabled: z.boolean().default(true),
          fileName: z.string().min(1).default(DEFAULT_MIRROR_FILE),
        })
        .default({}),
    })
    .default({}),
});

export interface ConfigOverrides {
  subjects?: string[];
  storageRoot?: string;
  maxResults?: number;
  overwriteExisting?: boolean;
}

export function loadYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf8');
  return YAML.parse(raw);
}

export function parseConfig(raw: unknown, source = 'config'): AppConfig {
  const res = AppConfigSchema.safeParse(raw);
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return res.data;
}

export function loadConfig(repoRoot: string, configPath = path.join(repoRoot, 'config.yml')): AppConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Missing config.yml at ${configPath}. Copy config.example.yml → config.yml and edit.`);
  }
  return parseConfig(loadYamlFile(configPath), configPath);
}

export function withOverrides(config: AppConfig, o: ConfigOverrides): AppConfig {
  return {
    subjects: o.subjects && o.subjects.length > 0 ? o.subjects : config.subjects,
    storage: { root: o.storageRoot ?? config.storage.root },
    fetch: { ...config.fetch, maxResults: o.maxResults ?? config.fetch.maxResults },
    output: {
      ...config.output,
      overwriteExisting: o.overwriteExisting ?? config.output.overwriteExisting,
    },
  };
}
