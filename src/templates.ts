import { extname } from 'node:path';
import type { AudiobookSet, CasePolicy, ProviderIdentity, Track } from './types.js';

export const TEMPLATE_TOKENS = [
  'Author',
  'AuthorLastFirst',
  'Title',
  'ShortTitle',
  'SeriesName',
  'SeriesIndex',
  'Year',
  'Narrator',
  'DiscPad',
  'TrackPad',
  'Disc',
  'Track',
  'TrackTitle',
  'Language',
  'ISBN',
] as const;

export type TemplateToken = (typeof TEMPLATE_TOKENS)[number];

export type TokenValues = Record<TemplateToken, string>;

export const DEFAULT_FOLDER_TEMPLATE = '{AuthorLastFirst}/{Title} ({Year})';
export const DEFAULT_FILENAME_TEMPLATE = '{DiscPad}{TrackPad} - {Title}';

const UNKNOWN_TITLE = 'Unknown Title';
const UNKNOWN_AUTHOR = 'Unknown Author';
const SHORT_TITLE_LENGTH = 30;
const MAX_COMPONENT_LENGTH = 100;
const MAX_FILENAME_LENGTH = 255;
const ELLIPSIS = '...';

// '/' is only forbidden inside a rendered component; in templates it separates directories.
const FORBIDDEN_CHARS = ['<', '>', ':', '"', '/', '\\', '|', '?', '*'];
const TEMPLATE_FORBIDDEN_CHARS = FORBIDDEN_CHARS.filter((char) => char !== '/');

const MINOR_WORDS = new Set([
  'a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'if', 'in',
  'nor', 'of', 'on', 'or', 'so', 'the', 'to', 'up', 'yet',
]);

const TOKEN_PATTERN = /\{([^{}]*)\}/g;

export interface TemplateEngineOptions {
  casePolicy?: CasePolicy;
  unicodeNormalize?: boolean;
  maxPathLength?: number;
  lowercaseMinorWords?: boolean;
}

export interface TemplateValidation {
  valid: boolean;
  errors: string[];
}

function isTemplateToken(name: string): name is TemplateToken {
  return TEMPLATE_TOKENS.some((token) => token === name);
}

function digits(value: number): number {
  return String(Math.max(1, Math.trunc(value))).length;
}

function replaceForbidden(text: string, forbidden: string[]): string {
  let result = text;

  for (const char of forbidden) {
    result = result.split(char).join('_');
  }

  return result;
}

export function formatAuthorLastFirst(author: string): string {
  const parts = author.trim().split(/\s+/).filter(Boolean);

  if (parts.length <= 1) {
    return author.trim();
  }

  const surname = parts[parts.length - 1];
  return `${surname}, ${parts.slice(0, -1).join(' ')}`;
}

/**
 * Cuts a title at the last word boundary that fits within maxLength, falling
 * back to a hard cut when the first word alone is too long.
 */
export function shortenTitle(title: string, maxLength: number = SHORT_TITLE_LENGTH): string {
  if (title.length <= maxLength) {
    return title;
  }

  const window = title.slice(0, maxLength + 1);
  const boundary = window.lastIndexOf(' ');

  if (boundary > 0) {
    return title.slice(0, boundary).trimEnd();
  }

  return title.slice(0, maxLength);
}

export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const budget = maxLength - ELLIPSIS.length;

  if (budget <= 0) {
    return text.slice(0, maxLength);
  }

  const window = text.slice(0, budget + 1);
  const boundary = window.lastIndexOf(' ');
  const kept = boundary > 0 ? text.slice(0, boundary) : text.slice(0, budget);

  return kept.trimEnd() + ELLIPSIS;
}

function capitalize(word: string): string {
  const lower = word.toLowerCase();
  const first = lower.search(/\p{L}/u);

  if (first < 0) {
    return lower;
  }

  return lower.slice(0, first) + lower.charAt(first).toUpperCase() + lower.slice(first + 1);
}

export function toTitleCase(text: string, lowercaseMinorWords = false): string {
  const words = text.split(/\s+/).filter(Boolean);

  return words
    .map((word, index) => {
      if (lowercaseMinorWords && index > 0 && MINOR_WORDS.has(word.toLowerCase())) {
        return word.toLowerCase();
      }

      return capitalize(word);
    })
    .join(' ');
}

/**
 * Tidies a rendered component: drops brackets left empty by missing tokens,
 * collapses whitespace, reduces separator runs such as " - - " or "__" to one
 * separator and strips separators from both ends.
 */
export function cleanSeparators(text: string): string {
  return text
    .replace(/\(\s*\)|\[\s*\]/g, '')
    .replace(/\s+/g, ' ')
    .replace(/(\s*)([-_])(?:\s*[-_])+(\s*)/g, '$1$2$3')
    .replace(/^[\s_-]+|[\s_-]+$/g, '');
}

function positionOf(set: AudiobookSet, track: Track): number {
  if (track.trackIndex !== null) {
    return track.trackIndex;
  }

  const sameDisc = set.tracks.filter((candidate) => candidate.disc === track.disc);
  const highest = sameDisc.reduce((max, candidate) => Math.max(max, candidate.trackIndex ?? 0), 0);
  const unnumbered = sameDisc
    .filter((candidate) => candidate.trackIndex === null)
    .map((candidate) => candidate.srcPath)
    .sort();

  return highest + unnumbered.indexOf(track.srcPath) + 1;
}

/**
 * The track number a file renders with. Unnumbered tracks follow the numbered
 * tracks of their disc in filename order.
 */
export function effectiveTrackIndex(set: AudiobookSet, track: Track): number {
  return Math.max(1, positionOf(set, track));
}

export class TemplateEngine {
  readonly casePolicy: CasePolicy;
  readonly unicodeNormalize: boolean;
  readonly maxPathLength: number;
  readonly lowercaseMinorWords: boolean;

  constructor(options: TemplateEngineOptions = {}) {
    this.casePolicy = options.casePolicy ?? 'title_case';
    this.unicodeNormalize = options.unicodeNormalize ?? true;
    this.maxPathLength = options.maxPathLength ?? 255;
    this.lowercaseMinorWords = options.lowercaseMinorWords ?? false;
  }

  applyCasePolicy(text: string): string {
    if (!text) {
      return text;
    }

    switch (this.casePolicy) {
      case 'title_case':
        return toTitleCase(text, this.lowercaseMinorWords);
      case 'lower_case':
        return text.toLowerCase();
      case 'upper_case':
        return text.toUpperCase();
      case 'as_is':
        return text;
    }
  }

  /**
   * Resolves every token. Identity fields win, then the set's guesses, then a
   * fixed fallback or the empty string. Disc tokens are empty for single-disc
   * sets; an explicit zeroPaddingWidth pads the track only.
   */
  buildTokens(
    set: AudiobookSet,
    identity: ProviderIdentity | null = null,
    track: Track | null = null,
    zeroPaddingWidth = 0
  ): TokenValues {
    const title = identity?.title || set.rawTitleGuess || UNKNOWN_TITLE;
    const author = identity?.authors.find((name) => name.trim()) ?? set.authorGuess;
    const year = identity?.year ?? set.yearGuess;

    const tokens: TokenValues = {
      Author: author || UNKNOWN_AUTHOR,
      AuthorLastFirst: author ? formatAuthorLastFirst(author) : UNKNOWN_AUTHOR,
      Title: title,
      ShortTitle: shortenTitle(title),
      SeriesName: identity?.seriesName || set.seriesGuess || '',
      SeriesIndex: identity?.seriesIndex || set.volumeGuess || '',
      Year: year !== null && year !== undefined ? String(year) : '',
      Narrator: identity?.narrator || set.narratorGuess || '',
      DiscPad: '',
      TrackPad: '',
      Disc: '',
      Track: '',
      TrackTitle: '',
      Language: identity?.language || set.languageGuess || '',
      ISBN: identity?.isbn13 || identity?.isbn10 || '',
    };

    if (track) {
      const index = effectiveTrackIndex(set, track);
      const highest = set.tracks.reduce((max, member) => Math.max(max, effectiveTrackIndex(set, member)), index);
      const trackWidth = zeroPaddingWidth > 0 ? zeroPaddingWidth : digits(highest);

      tokens.Track = String(index);
      tokens.TrackPad = String(index).padStart(trackWidth, '0');
      tokens.TrackTitle = track.existingTags.title?.trim() || `Track ${index}`;

      if (set.discCount > 1) {
        tokens.Disc = String(track.disc);
        tokens.DiscPad = String(track.disc).padStart(digits(set.discCount), '0');
      }
    }

    for (const token of TEMPLATE_TOKENS) {
      tokens[token] = this.applyCasePolicy(tokens[token]);
    }

    return tokens;
  }

  /** Substitutes tokens into one path component and tidies separators. */
  render(template: string, tokens: TokenValues): string {
    const substituted = template.replace(TOKEN_PATTERN, (_, name: string) =>
      isTemplateToken(name) ? tokens[name] : ''
    );

    return cleanSeparators(substituted);
  }

  generateFilename(
    track: Track,
    set: AudiobookSet,
    identity: ProviderIdentity | null = null,
    template: string = DEFAULT_FILENAME_TEMPLATE,
    zeroPaddingWidth = 0
  ): string {
    const tokens = this.buildTokens(set, identity, track, zeroPaddingWidth);
    const extension = extname(track.srcPath);
    let filename = this.render(template, tokens);

    if (extension && !filename.endsWith(extension)) {
      filename += extension;
    }

    return this.normalizeFilename(filename);
  }

  /**
   * Renders a folder path. Each '/'-separated part of the template is rendered
   * on its own, so a '/' inside a value cannot create a directory. Parts that
   * render empty are dropped.
   */
  generateFolderName(
    set: AudiobookSet,
    identity: ProviderIdentity | null = null,
    template: string = DEFAULT_FOLDER_TEMPLATE
  ): string {
    const tokens = this.buildTokens(set, identity);

    for (const token of TEMPLATE_TOKENS) {
      tokens[token] = tokens[token].split('/').join('_');
    }

    const components = template
      .split('/')
      .map((part) => this.render(part, tokens))
      .filter(Boolean);

    return this.normalizePath(components.join('/'));
  }

  validateTemplate(template: string): TemplateValidation {
    const errors: string[] = [];

    if (!template.trim()) {
      errors.push('Template is empty');
    }

    const forbidden = TEMPLATE_FORBIDDEN_CHARS.filter((char) => template.includes(char));

    if (forbidden.length > 0) {
      errors.push(`Template contains forbidden characters: ${forbidden.join(' ')}`);
    }

    const opening = template.split('{').length - 1;
    const closing = template.split('}').length - 1;

    if (opening !== closing) {
      errors.push(`Template has unmatched braces (${opening} '{' vs ${closing} '}')`);
    }

    for (const match of template.matchAll(TOKEN_PATTERN)) {
      if (!isTemplateToken(match[1])) {
        errors.push(`Unknown token: {${match[1]}}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  normalizeFilename(filename: string): string {
    let result = this.unicodeNormalize ? filename.normalize('NFC') : filename;
    result = replaceForbidden(result, FORBIDDEN_CHARS);

    if (result.length > MAX_FILENAME_LENGTH) {
      const extension = extname(result);
      const stem = result.slice(0, result.length - extension.length);
      result = truncateAtWord(stem, MAX_FILENAME_LENGTH - extension.length) + extension;
    }

    return result.trim();
  }

  normalizePath(path: string): string {
    const normalized = this.unicodeNormalize ? path.normalize('NFC') : path;

    const result = normalized
      .split('/')
      .map((part) => truncateAtWord(replaceForbidden(part, FORBIDDEN_CHARS).trim(), MAX_COMPONENT_LENGTH))
      .join('/');

    return truncateAtWord(result, this.maxPathLength);
  }
}
