export const AUDIO_FORMATS = ['mp3', 'm4a', 'm4b', 'flac', 'ogg', 'opus', 'aac', 'wav'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export type TrackStatus =
  | 'pending'
  | 'valid'
  | 'missing_number'
  | 'duplicate'
  | 'suspicious_duration'
  | 'mixed_format'
  | 'error';

// high > 0.85 auto-select, medium 0.65-0.85 needs confirmation, low < 0.65 manual pick
export type MatchConfidence = 'high' | 'medium' | 'low';

export type CasePolicy = 'title_case' | 'lower_case' | 'upper_case' | 'as_is';

export interface AudioTags {
  title?: string;
  album?: string;
  artist?: string;
  albumArtist?: string;
  track?: number;
  disc?: number;
  date?: string;
  genre?: string;
  language?: string;
  series?: string;
  seriesIndex?: string;
  narrator?: string;
  comment?: string;
  isbn?: string;
  asin?: string;
  rawTags: Record<string, unknown>;
}

export interface Track {
  srcPath: string;
  disc: number;
  trackIndex: number | null;
  duration: number | null;
  bitrate: number | null;
  channels: number | null;
  sampleRate: number | null;
  fileSize: number;
  audioFormat: AudioFormat;
  existingTags: AudioTags;
  proposedName: string | null;
  proposedTags: AudioTags | null;
  status: TrackStatus;
  warnings: string[];
}

export interface ProviderIdentity {
  provider: string;
  externalId: string;
  title: string;
  authors: string[];
  seriesName: string | null;
  seriesIndex: string | null;
  year: number | null;
  language: string | null;
  narrator: string | null;
  edition: string | null;
  publisher: string | null;
  isbn10: string | null;
  isbn13: string | null;
  asin: string | null;
  description: string | null;
  coverUrls: string[];
  rawData: Record<string, unknown>;
}

export interface MatchCandidate {
  identity: ProviderIdentity;
  confidence: number;
  confidenceLevel: MatchConfidence;
  matchReasons: string[];
}

export interface AudiobookSet {
  sourcePath: string;
  rawTitleGuess: string | null;
  authorGuess: string | null;
  seriesGuess: string | null;
  volumeGuess: string | null;
  narratorGuess: string | null;
  languageGuess: string | null;
  yearGuess: number | null;
  discCount: number;
  totalTracks: number;
  totalDuration: number | null;
  tracks: Track[];
  providerCandidates: MatchCandidate[];
  chosenIdentity: ProviderIdentity | null;
  skipped: boolean;
  warnings: string[];
}

export interface RenameOperation {
  oldPath: string;
  newPath: string;
  tempPath: string | null;
  track: Track;
}

export interface RenamePlan {
  planId: string;
  createdAt: string;
  sourcePath: string;
  operations: RenameOperation[];
  audiobookSets: AudiobookSet[];
  dryRun: boolean;
  conflicts: string[];
  warnings: string[];
}

export type OperationType = 'rename' | 'retag';

export interface OperationRecord {
  operationId: string;
  timestamp: string;
  operationType: OperationType;
  oldPath: string | null;
  newPath: string | null;
  oldTags: AudioTags | null;
  newTags: AudioTags | null;
  oldContentHash: string | null;
  newContentHash: string | null;
  success: boolean;
  error?: string;
  metadata: Record<string, unknown>;
}

export interface ExecutionLog {
  planId: string;
  executedAt: string;
  records: OperationRecord[];
  rolledBack: boolean;
}

export interface ScoringWeights {
  title: number;
  author: number;
  series: number;
  narrator: number;
  year: number;
  language: number;
  publicDomain: number;
}

export interface ScanResultsFile {
  scannedAt: string;
  roots: string[];
  sets: AudiobookSet[];
}
