import { basename } from 'node:path';
import { input, select } from '@inquirer/prompts';
import chalk from 'chalk';
import type { AudiobookSet, MatchCandidate, ProviderIdentity } from './types.js';
import { emptyIdentity } from './providers/types.js';
import { formatDuration } from './metadata.js';

const MAX_CHOICES = 8;

export type PromptAction = 'choose' | 'guesses' | 'skip' | 'quit';

export interface PromptResult {
  identity: ProviderIdentity | null;
  action: PromptAction;
}

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) {
    return str;
  }
  return str.slice(0, maxLen - 3) + '...';
}

export function describeCandidate(candidate: MatchCandidate): string {
  const { identity } = candidate;
  const percent = Math.round(candidate.confidence * 100);
  const authors = identity.authors.length > 0 ? ` by ${identity.authors.join(', ')}` : '';
  const year = identity.year !== null ? ` (${identity.year})` : '';
  const series = identity.seriesName
    ? ` [${identity.seriesName}${identity.seriesIndex ? ` #${identity.seriesIndex}` : ''}]`
    : '';

  return `${identity.title}${authors}${year}${series} - ${identity.provider}, ${percent}% ${candidate.confidenceLevel}`;
}

function printSet(set: AudiobookSet): void {
  console.log('\n' + '─'.repeat(60));
  console.log(`📁 ${truncate(basename(set.sourcePath), 58)}`);
  console.log('─'.repeat(60));
  console.log(`   Title:  ${set.rawTitleGuess ?? '(unknown)'}`);
  console.log(`   Author: ${set.authorGuess ?? '(unknown)'}`);

  if (set.seriesGuess) {
    console.log(`   Series: ${set.seriesGuess}${set.volumeGuess ? ` #${set.volumeGuess}` : ''}`);
  }

  const duration = set.totalDuration !== null ? `, ${formatDuration(set.totalDuration)}` : '';
  console.log(chalk.gray(`   ${set.totalTracks} tracks on ${set.discCount} disc(s)${duration}`));
  console.log('');
}

async function promptForText(field: string, defaultValue: string | null): Promise<string> {
  const value = await input({
    message: `${field}:`,
    default: defaultValue ?? undefined,
  });

  return value.trim();
}

/**
 * Asks for a title, author and series by hand, defaulting to the folder
 * guesses.
 */
export async function promptForManualIdentity(set: AudiobookSet): Promise<ProviderIdentity> {
  const title = await promptForText('Title', set.rawTitleGuess);
  const author = await promptForText('Author', set.authorGuess);
  const series = await promptForText('Series (blank for none)', set.seriesGuess);
  const seriesIndex = series ? await promptForText('Series index', set.volumeGuess) : '';
  const year = await promptForText('Year (blank for unknown)', set.yearGuess !== null ? String(set.yearGuess) : null);

  const identity = emptyIdentity('manual', `manual:${set.sourcePath}`, title || 'Unknown Title');
  identity.authors = author ? [author] : [];
  identity.seriesName = series || null;
  identity.seriesIndex = seriesIndex || null;
  identity.year = /^\d{4}$/.test(year) ? Number.parseInt(year, 10) : null;

  return identity;
}

export async function promptForIdentity(set: AudiobookSet): Promise<PromptResult> {
  printSet(set);

  const candidates = set.providerCandidates.slice(0, MAX_CHOICES);

  if (candidates.length === 0) {
    console.log(chalk.yellow('   No matches found, needs manual identification'));
  }

  const choices: Array<{ name: string; value: string }> = candidates.map((candidate, index) => ({
    name: describeCandidate(candidate),
    value: String(index),
  }));

  choices.push(
    { name: '✏️  Enter details manually', value: 'manual' },
    { name: '📂 Use folder guesses', value: 'guesses' },
    { name: '⏭️  Skip this audiobook', value: 'skip' },
    { name: '🚪 Quit', value: 'quit' }
  );

  const selected = await select({
    message: 'Which book is this?',
    choices,
    pageSize: 15,
  });

  if (selected === 'skip' || selected === 'quit' || selected === 'guesses') {
    return { identity: null, action: selected };
  }

  if (selected === 'manual') {
    return { identity: await promptForManualIdentity(set), action: 'choose' };
  }

  const chosen = candidates[Number.parseInt(selected, 10)];

  return chosen ? { identity: chosen.identity, action: 'choose' } : { identity: null, action: 'skip' };
}
