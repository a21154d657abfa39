import { parseFile } from 'music-metadata';
import type { AudioTags } from './types.js';

export interface AudioProbe {
  duration: number | null;
  bitrate: number | null;
  channels: number | null;
  sampleRate: number | null;
  codec: string | null;
  tags: AudioTags;
}

export type AudioProber = (filePath: string) => Promise<AudioProbe>;

export function emptyTags(): AudioTags {
  return { rawTags: {} };
}

export function emptyProbe(): AudioProbe {
  return {
    duration: null,
    bitrate: null,
    channels: null,
    sampleRate: null,
    codec: null,
    tags: emptyTags(),
  };
}

/** The parts of a music-metadata result that tags are read from. */
export interface TagSource {
  common: {
    title?: string;
    album?: string;
    artist?: string;
    artists?: string[];
    albumartist?: string;
    composer?: string[];
    track: { no: number | null };
    disk: { no: number | null };
    date?: string;
    year?: number;
    genre?: string[];
    language?: string;
    asin?: string;
  };
  native: Record<string, Array<{ id: string; value: unknown }>>;
}

type CustomField = 'narrator' | 'series' | 'seriesIndex' | 'isbn' | 'asin';

// Free-form frame names, after the ID3 TXXX: or MP4 ----:com.apple.iTunes: prefix is removed.
const CUSTOM_FIELDS: ReadonlyMap<string, CustomField> = new Map([
  ['NARRATOR', 'narrator'],
  ['©NRT', 'narrator'],
  ['SERIES', 'series'],
  ['SERIES-PART', 'seriesIndex'],
  ['SERIES_PART', 'seriesIndex'],
  ['SERIESPART', 'seriesIndex'],
  ['ISBN', 'isbn'],
  ['ASIN', 'asin'],
  ['AUDIBLE_ASIN', 'asin'],
]);

const CUSTOM_PREFIXES = ['TXXX:', '----:com.apple.iTunes:'];

function customFieldOf(id: string): CustomField | null {
  const prefix = CUSTOM_PREFIXES.find((candidate) => id.startsWith(candidate));
  const name = (prefix ? id.slice(prefix.length) : id).toUpperCase();

  return CUSTOM_FIELDS.get(name) ?? null;
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() || null;
  }

  if (typeof value === 'number') {
    return String(value);
  }

  if (Array.isArray(value)) {
    return value.length > 0 ? textOf(value[0]) : null;
  }

  if (typeof value === 'object' && value !== null && 'text' in value) {
    return textOf(value.text);
  }

  return null;
}

/**
 * Maps common tags plus the free-form narrator, series, ISBN and ASIN frames
 * (ID3 TXXX, MP4 iTunes atoms, Vorbis comments) into AudioTags. The composer
 * stands in for a missing narrator.
 */
export function mapTags(metadata: TagSource): AudioTags {
  const { common } = metadata;
  const tags: AudioTags = { rawTags: {} };

  if (common.title) tags.title = common.title;
  if (common.album) tags.album = common.album;
  if (common.artist ?? common.artists?.[0]) tags.artist = common.artist ?? common.artists?.[0];
  if (common.albumartist) tags.albumArtist = common.albumartist;
  if (common.track.no) tags.track = common.track.no;
  if (common.disk.no) tags.disc = common.disk.no;
  if (common.date ?? common.year) tags.date = common.date ?? String(common.year);
  if (common.genre?.length) tags.genre = common.genre[0];
  if (common.language) tags.language = common.language;
  if (common.asin) tags.asin = common.asin;

  for (const [tagFormat, nativeTags] of Object.entries(metadata.native)) {
    tags.rawTags[tagFormat] = nativeTags.map((tag) => ({ id: tag.id, value: tag.value }));

    for (const tag of nativeTags) {
      const field = customFieldOf(tag.id);
      const text = textOf(tag.value);

      if (field && text && !tags[field]) {
        tags[field] = text;
      }
    }
  }

  const composer = common.composer?.[0]?.trim();

  if (!tags.narrator && composer) {
    tags.narrator = composer;
  }

  return tags;
}

/**
 * Reads stream properties and tags with music-metadata. Missing fields stay null
 * and unreadable files yield an empty probe rather than an error.
 */
export async function probeAudio(filePath: string): Promise<AudioProbe> {
  try {
    const metadata = await parseFile(filePath, { duration: true, skipCovers: true });
    const { format } = metadata;

    return {
      duration: format.duration ?? null,
      bitrate: format.bitrate ? Math.round(format.bitrate / 1000) : null,
      channels: format.numberOfChannels ?? null,
      sampleRate: format.sampleRate ?? null,
      codec: format.codec ?? null,
      tags: mapTags(metadata),
    };
  } catch {
    return emptyProbe();
  }
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  const secs = Math.floor(seconds % 60);

  if (hours > 0) {
    return `${hours}:${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  }

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}
