import { extname, dirname, basename, join } from 'node:path';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { rename, unlink } from 'node:fs/promises';
import NodeID3 from 'node-id3';
import type { AudioTags } from './types.js';

const execFileAsync = promisify(execFile);

export type TagWriter = (filePath: string, tags: AudioTags) => Promise<void>;

async function checkFfmpeg(): Promise<boolean> {
  try {
    await execFileAsync('ffmpeg', ['-version']);
    return true;
  } catch {
    return false;
  }
}

export function toId3Tags(tags: AudioTags): NodeID3.Tags {
  const id3: NodeID3.Tags = {};
  const userDefinedText: Array<{ description: string; value: string }> = [];

  if (tags.title) {
    id3.title = tags.title;
  }

  if (tags.album) {
    id3.album = tags.album;
  }

  if (tags.artist) {
    id3.artist = tags.artist;
  }

  if (tags.albumArtist) {
    id3.performerInfo = tags.albumArtist;
  }

  if (tags.track !== undefined) {
    id3.trackNumber = String(tags.track);
  }

  if (tags.disc !== undefined) {
    id3.partOfSet = String(tags.disc);
  }

  if (tags.date) {
    id3.year = tags.date;
  }

  if (tags.genre) {
    id3.genre = tags.genre;
  }

  if (tags.language) {
    id3.language = tags.language;
  }

  if (tags.narrator) {
    id3.composer = tags.narrator;
    userDefinedText.push({ description: 'NARRATOR', value: tags.narrator });
  }

  if (tags.series) {
    userDefinedText.push({ description: 'SERIES', value: tags.series });
  }

  if (tags.seriesIndex) {
    userDefinedText.push({ description: 'SERIES-PART', value: tags.seriesIndex });
  }

  if (tags.isbn) {
    userDefinedText.push({ description: 'ISBN', value: tags.isbn });
  }

  if (tags.asin) {
    userDefinedText.push({ description: 'ASIN', value: tags.asin });
  }

  if (userDefinedText.length > 0) {
    id3.userDefinedText = userDefinedText;
  }

  return id3;
}

export function toFfmpegMetadata(tags: AudioTags): string[] {
  const entries: Array<[string, string | number | undefined]> = [
    ['title', tags.title],
    ['album', tags.album],
    ['artist', tags.artist],
    ['album_artist', tags.albumArtist],
    ['track', tags.track],
    ['disc', tags.disc],
    ['date', tags.date],
    ['genre', tags.genre],
    ['language', tags.language],
    ['composer', tags.narrator],
    ['comment', tags.comment],
  ];

  return entries
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== '')
    .flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
}

async function writeMp3Tags(filePath: string, tags: AudioTags): Promise<void> {
  const result = NodeID3.update(toId3Tags(tags), filePath);

  if (result !== true) {
    throw result instanceof Error ? result : new Error('Failed to write MP3 tags');
  }
}

async function writeWithFfmpeg(filePath: string, tags: AudioTags): Promise<void> {
  const hasFfmpeg = await checkFfmpeg();

  if (!hasFfmpeg) {
    throw new Error('ffmpeg is required to tag non-MP3 files. Please install ffmpeg.');
  }

  const extension = extname(filePath);
  const tempPath = join(dirname(filePath), `.${basename(filePath, extension)}.tagging${extension}`);

  try {
    await execFileAsync('ffmpeg', ['-y', '-i', filePath, '-map', '0', '-c', 'copy', ...toFfmpegMetadata(tags), tempPath]);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }

  await rename(tempPath, filePath);
}

/**
 * Writes tags in place: node-id3 for MP3, an ffmpeg stream copy for other
 * formats. Audio data is never re-encoded.
 */
export async function writeTags(filePath: string, tags: AudioTags): Promise<void> {
  if (extname(filePath).toLowerCase() === '.mp3') {
    await writeMp3Tags(filePath, tags);
    return;
  }

  await writeWithFfmpeg(filePath, tags);
}
