import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { emptyProbe, mapTags, type AudioProber } from '../src/metadata.js';
import { queryForSet } from '../src/matcher.js';
import { findAudioFiles, findSetRoot, groupFilesByAudiobook, scanDirectory } from '../src/scanner.js';
import { createFiles, createTempDir, removeTempDir } from './helpers/fixtures.js';

describe('scanner', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('findAudioFiles', () => {
    it('collects supported extensions only and skips hidden entries', async () => {
      await createFiles(root, [
        'Book/01.mp3',
        'Book/02.M4B',
        'Book/cover.jpg',
        'Book/notes.txt',
        'Book/.03.mp3',
        '.hidden/01.mp3',
      ]);

      const { files, errors } = await findAudioFiles(root);

      expect(files).toEqual([join(root, 'Book/01.mp3'), join(root, 'Book/02.M4B')]);
      expect(errors).toEqual([]);
    });

    it('respects maxDepth and recursive', async () => {
      await createFiles(root, ['top.mp3', 'a/one.mp3', 'a/b/two.mp3']);

      expect((await findAudioFiles(root, { maxDepth: 1 })).files).toEqual([
        join(root, 'a/one.mp3'),
        join(root, 'top.mp3'),
      ]);
      expect((await findAudioFiles(root, { recursive: false })).files).toEqual([join(root, 'top.mp3')]);
    });

    it('reports an unreadable root as an error instead of throwing', async () => {
      const result = await findAudioFiles(join(root, 'missing'));

      expect(result.files).toEqual([]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe(join(root, 'missing'));
    });
  });

  describe('grouping', () => {
    it('lifts disc folders into their parent set but never above the root', () => {
      expect(findSetRoot(join(root, 'Book/CD1'), root)).toBe(join(root, 'Book'));
      expect(findSetRoot(join(root, 'Book'), root)).toBe(join(root, 'Book'));
      expect(findSetRoot(join(root, 'CD1'), root)).toBe(root);
      expect(findSetRoot(root, root)).toBe(root);
    });

    it('keeps Book and Volume folders as separate sets', () => {
      const groups = groupFilesByAudiobook(
        [
          join(root, 'Series/Book 1/01.mp3'),
          join(root, 'Series/Book 2/01.mp3'),
          join(root, 'Other/CD1/01.mp3'),
          join(root, 'Other/CD2/01.mp3'),
        ],
        root
      );

      expect([...groups.keys()]).toEqual([
        join(root, 'Series/Book 1'),
        join(root, 'Series/Book 2'),
        join(root, 'Other'),
      ]);
      expect(groups.get(join(root, 'Other'))).toHaveLength(2);
    });
  });

  describe('scanDirectory', () => {
    it('builds one set per audiobook, sorted by source path', async () => {
      await createFiles(root, [
        'Brandon Sanderson - The Way of Kings (2010)/CD1/01 Prelude.mp3',
        'Brandon Sanderson - The Way of Kings (2010)/CD1/02 Prologue.mp3',
        'Brandon Sanderson - The Way of Kings (2010)/CD2/01 Chapter One.mp3',
        'Brandon Sanderson - The Way of Kings (2010)/CD2/02 Chapter Two.mp3',
        'Anthology/01 Story.mp3',
        'Empty/readme.txt',
      ]);

      const sets = await scanDirectory(root, { probe: false });

      expect(sets.map((set) => set.sourcePath)).toEqual([
        join(root, 'Anthology'),
        join(root, 'Brandon Sanderson - The Way of Kings (2010)'),
      ]);

      const book = sets[1];

      expect(book.rawTitleGuess).toBe('The Way of Kings');
      expect(book.authorGuess).toBe('Brandon Sanderson');
      expect(book.yearGuess).toBe(2010);
      expect(book.discCount).toBe(2);
      expect(book.totalTracks).toBe(4);
      expect(book.totalDuration).toBeNull();
      expect(book.tracks.map((track) => [track.disc, track.trackIndex])).toEqual([
        [1, 1],
        [1, 2],
        [2, 1],
        [2, 2],
      ]);
      expect(book.tracks.every((track) => track.status === 'valid')).toBe(true);
      expect(book.warnings).toEqual([]);
    });

    it('annotates gaps and duplicates without dropping tracks', async () => {
      await createFiles(root, ['Book/01.mp3', 'Book/02 a.mp3', 'Book/02 b.mp3', 'Book/04.mp3']);

      const [set] = await scanDirectory(root, { probe: false });

      expect(set.totalTracks).toBe(4);
      expect(set.warnings).toEqual([
        'Disc 1 track numbers are not a contiguous 1..4 run: [1, 2, 2, 4]',
        'Disc 1 is missing track numbers: [3]',
        'Disc 1 has duplicate track numbers: [2]',
      ]);
      expect(set.tracks.map((track) => track.status)).toEqual(['valid', 'duplicate', 'duplicate', 'valid']);
    });

    it('flags unnumbered tracks and mixed formats', async () => {
      await createFiles(root, ['Book/01.mp3', 'Book/02.m4a', 'Book/Bonus.mp3']);

      const [set] = await scanDirectory(root, { probe: false });
      const byName = new Map(set.tracks.map((track) => [track.srcPath.slice(root.length + 6), track]));

      expect(byName.get('Bonus.mp3')?.status).toBe('missing_number');
      expect(byName.get('Bonus.mp3')?.trackIndex).toBeNull();
      expect(byName.get('01.mp3')?.status).toBe('mixed_format');
      expect(set.warnings).toEqual(['Mixed audio formats: m4a, mp3', '1 track(s) have no track number']);
    });

    it('flags a lone unnumbered file as missing its number', async () => {
      await createFiles(root, ['Hobbit/The Hobbit.m4b']);

      const [set] = await scanDirectory(root, { probe: false });

      expect(set.tracks[0].trackIndex).toBeNull();
      expect(set.tracks[0].status).toBe('missing_number');
      expect(set.warnings).toEqual(['1 track(s) have no track number']);
    });

    it('keeps the rest of a set when one file disappears mid-scan', async () => {
      await createFiles(root, ['Book/01.mp3', 'Book/02.mp3']);
      const missing = join(root, 'Book/02.mp3');
      const prober = vi.fn<AudioProber>(async (filePath) => {
        if (filePath.endsWith('01.mp3')) {
          await rm(missing);
        }

        return emptyProbe();
      });

      const [set] = await scanDirectory(root, { probe: prober });

      expect(set.tracks.map((track) => track.srcPath)).toEqual([join(root, 'Book/01.mp3')]);
      expect(set.totalTracks).toBe(1);
      expect(set.warnings).toEqual([
        `Skipped unreadable file 02.mp3: ENOENT: no such file or directory, stat '${missing}'`,
      ]);
    });

    it('warns about a disc number with no tracks', async () => {
      await createFiles(root, ['Book/CD1/01.mp3', 'Book/CD3/01.mp3']);

      const [set] = await scanDirectory(root, { probe: false });

      expect(set.discCount).toBe(3);
      expect(set.warnings).toEqual(['Disc 2 has no tracks']);
    });

    it('uses probe results for durations and tag numbers', async () => {
      await createFiles(root, ['Book/Intro.mp3', 'Book/Outro.mp3']);

      const prober = vi.fn<AudioProber>(async (filePath) => ({
        ...emptyProbe(),
        duration: 60,
        tags: {
          track: filePath.endsWith('Intro.mp3') ? 1 : 2,
          narrator: 'Test Narrator',
          rawTags: {},
        },
      }));

      const [set] = await scanDirectory(root, { probe: prober });

      expect(prober).toHaveBeenCalledTimes(2);
      expect(set.tracks.map((track) => track.trackIndex)).toEqual([1, 2]);
      expect(set.totalDuration).toBe(120);
      expect(set.narratorGuess).toBe('Test Narrator');
    });

    it('guesses narrator, series and ISBN from free-form tag frames', async () => {
      await createFiles(root, ['Book/01.mp3', 'Book/02.mp3']);
      const prober = vi.fn<AudioProber>(async () => ({
        ...emptyProbe(),
        tags: mapTags({
          common: { track: { no: null }, disk: { no: null } },
          native: {
            'ID3v2.3': [
              { id: 'TXXX:NARRATOR', value: 'Test Narrator' },
              { id: 'TXXX:SERIES', value: 'Dune Chronicles' },
              { id: 'TXXX:ISBN', value: '9780000000002' },
            ],
          },
        }),
      }));

      const [set] = await scanDirectory(root, { probe: prober });

      expect(set.narratorGuess).toBe('Test Narrator');
      expect(set.seriesGuess).toBe('Dune Chronicles');
      expect(queryForSet(set).isbn).toBe('9780000000002');
    });

    it('stops before building sets when the signal is aborted', async () => {
      await createFiles(root, ['Book/01.mp3']);
      const controller = new AbortController();
      controller.abort();

      expect(await scanDirectory(root, { probe: false, signal: controller.signal })).toEqual([]);
    });
  });
});
