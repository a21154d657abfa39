import { z } from 'zod';
import type {
  AudioTags,
  AudiobookSet,
  ExecutionLog,
  MatchCandidate,
  OperationRecord,
  ProviderIdentity,
  RenamePlan,
  ScanResultsFile,
  Track,
} from './types.js';
import { AUDIO_FORMATS } from './types.js';

// Schemas for the JSON files the CLI writes between steps.

export const AudioTagsSchema: z.ZodType<AudioTags> = z.object({
  title: z.string().optional(),
  album: z.string().optional(),
  artist: z.string().optional(),
  albumArtist: z.string().optional(),
  track: z.number().optional(),
  disc: z.number().optional(),
  date: z.string().optional(),
  genre: z.string().optional(),
  language: z.string().optional(),
  series: z.string().optional(),
  seriesIndex: z.string().optional(),
  narrator: z.string().optional(),
  comment: z.string().optional(),
  isbn: z.string().optional(),
  asin: z.string().optional(),
  rawTags: z.record(z.unknown()),
});

export const TrackSchema: z.ZodType<Track> = z.object({
  srcPath: z.string(),
  disc: z.number().int().positive(),
  trackIndex: z.number().int().nullable(),
  duration: z.number().nullable(),
  bitrate: z.number().nullable(),
  channels: z.number().nullable(),
  sampleRate: z.number().nullable(),
  fileSize: z.number(),
  audioFormat: z.enum(AUDIO_FORMATS),
  existingTags: AudioTagsSchema,
  proposedName: z.string().nullable(),
  proposedTags: AudioTagsSchema.nullable(),
  status: z.enum([
    'pending',
    'valid',
    'missing_number',
    'duplicate',
    'suspicious_duration',
    'mixed_format',
    'error',
  ]),
  warnings: z.array(z.string()),
});

export const ProviderIdentitySchema: z.ZodType<ProviderIdentity> = z.object({
  provider: z.string(),
  externalId: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  seriesName: z.string().nullable(),
  seriesIndex: z.string().nullable(),
  year: z.number().int().nullable(),
  language: z.string().nullable(),
  narrator: z.string().nullable(),
  edition: z.string().nullable(),
  publisher: z.string().nullable(),
  isbn10: z.string().nullable(),
  isbn13: z.string().nullable(),
  asin: z.string().nullable(),
  description: z.string().nullable(),
  coverUrls: z.array(z.string()),
  rawData: z.record(z.unknown()),
});

export const MatchCandidateSchema: z.ZodType<MatchCandidate> = z.object({
  identity: ProviderIdentitySchema,
  confidence: z.number().min(0).max(1),
  confidenceLevel: z.enum(['high', 'medium', 'low']),
  matchReasons: z.array(z.string()),
});

export const AudiobookSetSchema: z.ZodType<AudiobookSet> = z.object({
  sourcePath: z.string(),
  rawTitleGuess: z.string().nullable(),
  authorGuess: z.string().nullable(),
  seriesGuess: z.string().nullable(),
  volumeGuess: z.string().nullable(),
  narratorGuess: z.string().nullable(),
  languageGuess: z.string().nullable(),
  yearGuess: z.number().int().nullable(),
  discCount: z.number().int().positive(),
  totalTracks: z.number().int(),
  totalDuration: z.number().nullable(),
  tracks: z.array(TrackSchema),
  providerCandidates: z.array(MatchCandidateSchema),
  chosenIdentity: ProviderIdentitySchema.nullable(),
  skipped: z.boolean(),
  warnings: z.array(z.string()),
});

export const ScanResultsFileSchema: z.ZodType<ScanResultsFile> = z.object({
  scannedAt: z.string(),
  roots: z.array(z.string()),
  sets: z.array(AudiobookSetSchema),
});

export const RenamePlanSchema: z.ZodType<RenamePlan> = z.object({
  planId: z.string(),
  createdAt: z.string(),
  sourcePath: z.string(),
  operations: z.array(
    z.object({
      oldPath: z.string(),
      newPath: z.string(),
      tempPath: z.string().nullable(),
      track: TrackSchema,
    })
  ),
  audiobookSets: z.array(AudiobookSetSchema),
  dryRun: z.boolean(),
  conflicts: z.array(z.string()),
  warnings: z.array(z.string()),
});

export const OperationRecordSchema: z.ZodType<OperationRecord> = z.object({
  operationId: z.string(),
  timestamp: z.string(),
  operationType: z.enum(['rename', 'retag']),
  oldPath: z.string().nullable(),
  newPath: z.string().nullable(),
  oldTags: AudioTagsSchema.nullable(),
  newTags: AudioTagsSchema.nullable(),
  oldContentHash: z.string().nullable(),
  newContentHash: z.string().nullable(),
  success: z.boolean(),
  error: z.string().optional(),
  metadata: z.record(z.unknown()),
});

export const ExecutionLogSchema: z.ZodType<ExecutionLog> = z.object({
  planId: z.string(),
  executedAt: z.string(),
  records: z.array(OperationRecordSchema),
  rolledBack: z.boolean(),
});

export const CacheEntrySchema = z.object({
  identities: z.array(ProviderIdentitySchema),
  storedAt: z.number(),
});

export const SearchCacheSchema = z.object({
  entries: z.record(CacheEntrySchema),
});
