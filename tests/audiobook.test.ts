import { describe, expect, it } from 'vitest';
import {
  findSuspiciousTracks,
  getTracksForDisc,
  hasMultiDisc,
  isSuspiciousDuration,
  maxTrackIndex,
  trackCountByDisc,
  validateTrackOrder,
} from '../src/audiobook.js';
import { makeSet, makeTrack } from './helpers/fixtures.js';

function numbered(disc: number, indexes: Array<number | null>) {
  return indexes.map((trackIndex, position) =>
    makeTrack({ srcPath: `/library/Book/CD${disc}/${position}.mp3`, disc, trackIndex })
  );
}

describe('validateTrackOrder', () => {
  it('accepts contiguous numbering on every disc', () => {
    const set = makeSet({ discCount: 2, tracks: [...numbered(1, [1, 2, 3]), ...numbered(2, [1, 2])] });

    expect(validateTrackOrder(set)).toEqual([]);
  });

  it('reports gaps and duplicates', () => {
    const set = makeSet({ tracks: numbered(1, [4, 2, 1, 2]) });

    expect(validateTrackOrder(set)).toEqual([
      'Disc 1 track numbers are not a contiguous 1..4 run: [1, 2, 2, 4]',
      'Disc 1 is missing track numbers: [3]',
      'Disc 1 has duplicate track numbers: [2]',
    ]);
  });

  it('does not claim numbers are missing when a duplicate breaks the run', () => {
    const set = makeSet({ tracks: numbered(1, [1, 2, 2, 3]) });

    expect(validateTrackOrder(set)).toEqual([
      'Disc 1 track numbers are not a contiguous 1..4 run: [1, 2, 2, 3]',
      'Disc 1 has duplicate track numbers: [2]',
    ]);
  });

  it('reports a run that starts above one', () => {
    const set = makeSet({ tracks: numbered(1, [2, 3]) });

    expect(validateTrackOrder(set)).toEqual([
      'Disc 1 track numbers are not a contiguous 1..2 run: [2, 3]',
      'Disc 1 is missing track numbers: [1]',
    ]);
  });

  it('reports discs without tracks', () => {
    const set = makeSet({ discCount: 3, tracks: [...numbered(1, [1]), ...numbered(3, [1])] });

    expect(validateTrackOrder(set)).toEqual(['Disc 2 has no tracks']);
  });

  it('ignores unnumbered tracks', () => {
    const set = makeSet({ tracks: numbered(1, [1, null, 2]) });

    expect(validateTrackOrder(set)).toEqual([]);
  });
});

describe('set helpers', () => {
  const set = makeSet({ discCount: 2, tracks: [...numbered(2, [2, null, 1]), ...numbered(1, [5])] });

  it('orders a disc by number with unnumbered tracks last', () => {
    expect(getTracksForDisc(set, 2).map((track) => track.trackIndex)).toEqual([1, 2, null]);
  });

  it('counts tracks per disc and finds the highest number', () => {
    expect([...trackCountByDisc(set)]).toEqual([
      [2, 3],
      [1, 1],
    ]);
    expect(maxTrackIndex(set)).toBe(5);
    expect(hasMultiDisc(set)).toBe(true);
  });
});

describe('durations', () => {
  it('flags implausibly short and long tracks', () => {
    expect(isSuspiciousDuration(null)).toBe(false);
    expect(isSuspiciousDuration(0.5)).toBe(true);
    expect(isSuspiciousDuration(3600)).toBe(false);
    expect(isSuspiciousDuration(25 * 60 * 60)).toBe(true);
  });

  it('collects suspicious tracks of a set', () => {
    const short = makeTrack({ srcPath: '/library/Book/00.mp3', duration: 0.2 });
    const set = makeSet({ tracks: [short, makeTrack({ duration: 600 })] });

    expect(findSuspiciousTracks(set)).toEqual([short]);
  });
});
