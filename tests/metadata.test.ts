import { describe, expect, it } from 'vitest';
import { formatDuration, formatFileSize, mapTags, type TagSource } from '../src/metadata.js';

function source(overrides: Partial<TagSource['common']> = {}, native: TagSource['native'] = {}): TagSource {
  return {
    common: { track: { no: null }, disk: { no: null }, ...overrides },
    native,
  };
}

describe('mapTags', () => {
  it('copies the common tags', () => {
    const tags = mapTags(
      source({
        title: 'Chapter 1',
        album: 'Dune',
        artists: ['Frank Herbert'],
        track: { no: 3 },
        disk: { no: 2 },
        year: 1965,
        genre: ['Audiobook', 'Fiction'],
        asin: 'B000000001',
      })
    );

    expect(tags).toEqual({
      title: 'Chapter 1',
      album: 'Dune',
      artist: 'Frank Herbert',
      track: 3,
      disc: 2,
      date: '1965',
      genre: 'Audiobook',
      asin: 'B000000001',
      rawTags: {},
    });
  });

  it('reads narrator, series and ISBN from ID3 user-defined frames', () => {
    const tags = mapTags(
      source({}, {
        'ID3v2.4': [
          { id: 'TIT2', value: 'Chapter 1' },
          { id: 'TXXX:NARRATOR', value: 'Test Narrator' },
          { id: 'TXXX:SERIES', value: 'Dune Chronicles' },
          { id: 'TXXX:SERIES-PART', value: '1' },
          { id: 'TXXX:ISBN', value: '9780000000002' },
          { id: 'TXXX:ASIN', value: 'B000000002' },
        ],
      })
    );

    expect(tags).toMatchObject({
      narrator: 'Test Narrator',
      series: 'Dune Chronicles',
      seriesIndex: '1',
      isbn: '9780000000002',
      asin: 'B000000002',
    });
    expect(tags.rawTags['ID3v2.4']).toHaveLength(6);
  });

  it('reads iTunes free-form atoms and Vorbis comments', () => {
    const mp4 = mapTags(
      source({}, {
        iTunes: [
          { id: '----:com.apple.iTunes:NARRATOR', value: 'Test Narrator' },
          { id: '----:com.apple.iTunes:ISBN', value: ['9780000000019'] },
        ],
      })
    );
    const vorbis = mapTags(source({}, { vorbis: [{ id: 'series', value: { text: ' Dune Chronicles ' } }] }));

    expect(mp4.narrator).toBe('Test Narrator');
    expect(mp4.isbn).toBe('9780000000019');
    expect(vorbis.series).toBe('Dune Chronicles');
  });

  it('falls back to the composer for the narrator', () => {
    expect(mapTags(source({ composer: ['Test Reader'] })).narrator).toBe('Test Reader');
    expect(
      mapTags(source({ composer: ['Test Reader'] }, { 'ID3v2.3': [{ id: 'TXXX:NARRATOR', value: 'Test Narrator' }] }))
        .narrator
    ).toBe('Test Narrator');
  });

  it('keeps the common ASIN over a free-form one', () => {
    const tags = mapTags(
      source({ asin: 'B000000001' }, { iTunes: [{ id: '----:com.apple.iTunes:ASIN', value: 'B000000009' }] })
    );

    expect(tags.asin).toBe('B000000001');
  });
});

describe('formatting', () => {
  it('formats sizes and durations', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatDuration(null)).toBe('unknown');
    expect(formatDuration(65)).toBe('1:05');
    expect(formatDuration(3725)).toBe('1:02:05');
  });
});
