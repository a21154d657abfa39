import { describe, expect, it } from 'vitest';
import {
  TEMPLATE_TOKENS,
  TemplateEngine,
  cleanSeparators,
  effectiveTrackIndex,
  formatAuthorLastFirst,
  shortenTitle,
  toTitleCase,
  truncateAtWord,
} from '../src/templates.js';
import type { CasePolicy } from '../src/types.js';
import { makeIdentity, makeSet, makeTrack } from './helpers/fixtures.js';

const wayOfKings = makeIdentity({
  title: 'The Way of Kings',
  authors: ['Brandon Sanderson'],
  seriesName: 'The Stormlight Archive',
  seriesIndex: '1',
  year: 2010,
});

describe('text helpers', () => {
  it('formats author names surname first', () => {
    expect(formatAuthorLastFirst('Brandon Sanderson')).toBe('Sanderson, Brandon');
    expect(formatAuthorLastFirst('J. R. R. Tolkien')).toBe('Tolkien, J. R. R.');
    expect(formatAuthorLastFirst(' Plato ')).toBe('Plato');
  });

  it('shortens titles at a word boundary', () => {
    expect(shortenTitle('The Way of Kings and Other Stories')).toBe('The Way of Kings and Other');
    expect(shortenTitle('Dune')).toBe('Dune');
    expect(shortenTitle('A'.repeat(40))).toBe('A'.repeat(30));
  });

  it('truncates with an ellipsis', () => {
    expect(truncateAtWord('one two three four', 12)).toBe('one two...');
    expect(truncateAtWord('short', 12)).toBe('short');
  });

  it('title-cases every word unless minor words stay lower', () => {
    expect(toTitleCase('the WAY of  kings')).toBe('The Way Of Kings');
    expect(toTitleCase('the way of kings', true)).toBe('The Way of Kings');
    expect(toTitleCase("o'brien's tale")).toBe("O'brien's Tale");
  });

  it('removes separators and brackets left by empty tokens', () => {
    expect(cleanSeparators(' - Dune []')).toBe('Dune');
    expect(cleanSeparators('Dune -- _ Part ()')).toBe('Dune - Part');
    expect(cleanSeparators('__Dune__')).toBe('Dune');
  });
});

describe('TemplateEngine', () => {
  const engine = new TemplateEngine();

  describe('folders', () => {
    it('renders nested folder templates', () => {
      const folder = engine.generateFolderName(
        makeSet(),
        wayOfKings,
        '{AuthorLastFirst}/{SeriesName}/{SeriesIndex} - {Title} ({Year})'
      );

      expect(folder).toBe('Sanderson, Brandon/The Stormlight Archive/1 - The Way Of Kings (2010)');
    });

    it('falls back to guesses and then to placeholders', () => {
      const guessed = makeSet({ rawTitleGuess: 'dune', authorGuess: 'frank herbert', yearGuess: 1965 });

      expect(engine.generateFolderName(guessed)).toBe('Herbert, Frank/Dune (1965)');
      expect(engine.generateFolderName(makeSet())).toBe('Unknown Author/Unknown Title');
    });

    it('drops folder levels that render empty', () => {
      expect(engine.generateFolderName(makeSet({ rawTitleGuess: 'Dune' }), null, '{SeriesName}/{Title}')).toBe('Dune');
    });

    it('never lets a value create a directory', () => {
      const asIs = new TemplateEngine({ casePolicy: 'as_is' });
      const identity = makeIdentity({ title: 'AC/DC Story', authors: ['Someone'] });

      expect(asIs.generateFolderName(makeSet(), identity, '{Author}/{Title}')).toBe('Someone/AC_DC Story');
    });

    it('limits the total path length', () => {
      const short = new TemplateEngine({ maxPathLength: 40 });
      const identity = makeIdentity({ title: 'An Exceedingly Long Title For A Very Small Limit', authors: ['Author'] });
      const folder = short.generateFolderName(makeSet(), identity, '{Author}/{Title}');

      expect(folder).toBe('Author/An Exceedingly Long Title For...');
      expect(folder.length).toBeLessThanOrEqual(40);
    });
  });

  describe('filenames', () => {
    const discOne = makeTrack({ srcPath: '/library/Book/CD1/01.mp3', disc: 1, trackIndex: 1 });
    const discTwo = makeTrack({ srcPath: '/library/Book/CD2/01.mp3', disc: 2, trackIndex: 1 });
    const twoDiscs = makeSet({ discCount: 2, tracks: [discOne, discTwo] });

    it('prefixes the disc for multi-disc sets', () => {
      expect(engine.generateFilename(discOne, twoDiscs, wayOfKings, undefined, 2)).toBe('101 - The Way Of Kings.mp3');
      expect(engine.generateFilename(discTwo, twoDiscs, wayOfKings)).toBe('21 - The Way Of Kings.mp3');
    });

    it('leaves disc tokens empty for single-disc sets', () => {
      const track = makeTrack({ srcPath: '/library/Dune/03.m4b', trackIndex: 3 });
      const set = makeSet({ rawTitleGuess: 'Dune', tracks: [track] });
      const tokens = engine.buildTokens(set, null, track);

      expect(tokens.Disc).toBe('');
      expect(tokens.DiscPad).toBe('');
      expect(engine.generateFilename(track, set)).toBe('3 - Dune.m4b');
      expect(engine.generateFilename(track, set, null, 'Disc {Disc} - {Track}')).toBe('Disc - 3.m4b');
    });

    it('pads to the width of the highest track number', () => {
      const tracks = Array.from({ length: 150 }, (_, index) =>
        makeTrack({ srcPath: `/library/Long/${index + 1}.mp3`, trackIndex: index + 1 })
      );
      const set = makeSet({ tracks });

      expect(engine.buildTokens(set, null, tracks[6]).TrackPad).toBe('007');
      expect(engine.buildTokens(set, null, tracks[149]).TrackPad).toBe('150');
    });

    it('pads the disc to the digits of the disc count', () => {
      const track = makeTrack({ srcPath: '/library/Big/CD3/01.mp3', disc: 3, trackIndex: 1 });
      const set = makeSet({ discCount: 12, tracks: [track] });

      expect(engine.buildTokens(set, null, track).DiscPad).toBe('03');
    });

    it('uses the tag title or a numbered placeholder for TrackTitle', () => {
      const tagged = makeTrack({ trackIndex: 1, existingTags: { title: 'prologue', rawTags: {} } });
      const untagged = makeTrack({ srcPath: '/library/Book/05.mp3', trackIndex: 5 });
      const set = makeSet({ tracks: [tagged, untagged] });

      expect(engine.buildTokens(set, null, tagged).TrackTitle).toBe('Prologue');
      expect(engine.buildTokens(set, null, untagged).TrackTitle).toBe('Track 5');
    });

    it('places unnumbered tracks after the numbered ones in filename order', () => {
      const tracks = [
        makeTrack({ srcPath: '/library/Book/01.mp3', trackIndex: 1 }),
        makeTrack({ srcPath: '/library/Book/02.mp3', trackIndex: 2 }),
        makeTrack({ srcPath: '/library/Book/Outro.mp3', trackIndex: null, status: 'missing_number' }),
        makeTrack({ srcPath: '/library/Book/Bonus.mp3', trackIndex: null, status: 'missing_number' }),
      ];
      const set = makeSet({ tracks });

      expect(tracks.map((track) => effectiveTrackIndex(set, track))).toEqual([1, 2, 4, 3]);
    });

    it('tidies separators around empty tokens', () => {
      const track = makeTrack({ trackIndex: 1 });
      const set = makeSet({ rawTitleGuess: 'Dune', tracks: [track] });

      expect(engine.generateFilename(track, set, null, '{SeriesName} - {Title} [{Narrator}]')).toBe('Dune.mp3');
    });

    it('fills ISBN and language from the identity', () => {
      const identity = makeIdentity({ title: 'Dune', isbn10: '0441172717', isbn13: '9780441172719', language: 'eng' });
      const tokens = engine.buildTokens(makeSet(), identity);

      expect(tokens.ISBN).toBe('9780441172719');
      expect(tokens.Language).toBe('Eng');
    });
  });

  describe('case policies', () => {
    const set = makeSet({ rawTitleGuess: 'The Way of Kings' });

    const policies: Array<[CasePolicy, string]> = [
      ['lower_case', 'the way of kings'],
      ['upper_case', 'THE WAY OF KINGS'],
      ['as_is', 'The Way of Kings'],
      ['title_case', 'The Way Of Kings'],
    ];

    it.each(policies)('%s', (casePolicy, expected) => {
      expect(new TemplateEngine({ casePolicy }).buildTokens(set).Title).toBe(expected);
    });

    it('can keep minor words lower case', () => {
      expect(new TemplateEngine({ lowercaseMinorWords: true }).buildTokens(set).Title).toBe('The Way of Kings');
    });
  });

  describe('validateTemplate', () => {
    it('accepts known tokens and directory separators', () => {
      expect(engine.validateTemplate('{AuthorLastFirst}/{Title} ({Year})')).toEqual({ valid: true, errors: [] });
    });

    it('accepts a template made of every recognized token', () => {
      const template = TEMPLATE_TOKENS.map((token) => `{${token}}`).join(' - ');

      expect(TEMPLATE_TOKENS).toHaveLength(15);
      expect(engine.validateTemplate(template)).toEqual({ valid: true, errors: [] });
    });

    it('reports every problem', () => {
      expect(engine.validateTemplate('{Author}<{Nope}').errors).toEqual([
        'Template contains forbidden characters: <',
        'Unknown token: {Nope}',
      ]);
      expect(engine.validateTemplate('{Title').errors).toEqual(["Template has unmatched braces (1 '{' vs 0 '}')"]);
      expect(engine.validateTemplate('  ')).toEqual({ valid: false, errors: ['Template is empty'] });
    });
  });

  describe('normalization', () => {
    it('replaces forbidden characters', () => {
      expect(engine.normalizeFilename('File<with>more|forbidden?chars*.mp3')).toBe(
        'File_with_more_forbidden_chars_.mp3'
      );
    });

    it('is idempotent', () => {
      const once = engine.normalizeFilename('A: "Quoted" Title?.mp3');

      expect(once).toBe('A_ _Quoted_ Title_.mp3');
      expect(engine.normalizeFilename(once)).toBe(once);
    });

    it('composes unicode to NFC', () => {
      expect(engine.normalizeFilename('Cafe\u0301.mp3')).toBe('Caf\u00e9.mp3');
      expect(new TemplateEngine({ unicodeNormalize: false }).normalizeFilename('Cafe\u0301.mp3')).toBe(
        'Cafe\u0301.mp3'
      );
    });

    it('keeps the extension when truncating long filenames', () => {
      const name = engine.normalizeFilename(`${'word '.repeat(80)}end.mp3`);

      expect(name.length).toBeLessThanOrEqual(255);
      expect(name.endsWith('....mp3')).toBe(true);
    });
  });
});
