import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError, toError } from './errors.js';
import { DEFAULT_FILENAME_TEMPLATE, DEFAULT_FOLDER_TEMPLATE, TemplateEngine } from './templates.js';
import { DEFAULT_CACHE_FILE } from './cache.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const PROVIDER_IDS = ['openlibrary', 'librivox'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

const WeightsSchema = z
  .object({
    title: z.number().min(0),
    author: z.number().min(0),
    series: z.number().min(0),
    narrator: z.number().min(0),
    year: z.number().min(0),
    language: z.number().min(0),
    publicDomain: z.number().min(0),
  })
  .partial()
  .strict();

function providerSettings(rateLimitMs: number) {
  return z
    .object({
      enabled: z.boolean().default(true),
      timeoutMs: z.number().int().positive().default(30000),
      rateLimitMs: z.number().int().min(0).default(rateLimitMs),
      weights: WeightsSchema.optional(),
    })
    .strict();
}

const templateEngine = new TemplateEngine();

const TemplateSchema = z.string().superRefine((template, ctx) => {
  for (const error of templateEngine.validateTemplate(template).errors) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error });
  }
});

export const ConfigSchema = z
  .object({
    scanPaths: z.array(z.string().min(1)).default([]),
    maxDepth: z.number().int().min(0).default(5),
    recursive: z.boolean().default(true),
    probeAudio: z.boolean().default(true),
    folderTemplate: TemplateSchema.default(DEFAULT_FOLDER_TEMPLATE),
    filenameTemplate: TemplateSchema.default(DEFAULT_FILENAME_TEMPLATE),
    zeroPaddingWidth: z.number().int().min(0).max(10).default(0),
    casePolicy: z.enum(['title_case', 'lower_case', 'upper_case', 'as_is']).default('title_case'),
    lowercaseMinorWords: z.boolean().default(false),
    unicodeNormalize: z.boolean().default(true),
    maxPathLength: z.number().int().min(32).default(255),
    outputRoot: z.string().min(1).nullable().default(null),
    writeTags: z.boolean().default(false),
    providers: z
      .object({
        priorityOrder: z.array(z.enum(PROVIDER_IDS)).default([...PROVIDER_IDS]),
        openLibrary: providerSettings(100).default({}),
        librivox: providerSettings(250).default({}),
      })
      .strict()
      .default({}),
    cacheTtlHours: z.number().min(0).default(24 * 7),
    cacheFile: z.string().min(1).default(DEFAULT_CACHE_FILE),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export type ProviderSettings = Config['providers']['openLibrary'];

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Validates raw configuration values, filling in defaults for anything left
 * out and expanding '~' in paths.
 */
export function parseConfig(raw: unknown, source = 'config'): Config {
  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }

  const config = result.data;

  return {
    ...config,
    scanPaths: config.scanPaths.map(expandPath),
    outputRoot: config.outputRoot === null ? null : expandPath(config.outputRoot),
    cacheFile: expandPath(config.cacheFile),
  };
}

/**
 * Reads config.json. A missing file yields the defaults; an unreadable or
 * invalid one throws ConfigError listing every problem.
 */
export async function loadConfig(configFile: string = CONFIG_FILE): Promise<Config> {
  if (!existsSync(configFile)) {
    return parseConfig({}, configFile);
  }

  let data: string;

  try {
    data = await readFile(configFile, 'utf-8');
  } catch (error) {
    throw new ConfigError(configFile, [`cannot read file: ${toError(error).message}`]);
  }

  let raw: unknown;

  try {
    raw = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(configFile, [`invalid JSON: ${toError(error).message}`]);
  }

  return parseConfig(raw, configFile);
}
