#!/usr/bin/env node
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, join, relative, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import type { z } from 'zod';
import type { AudiobookSet, RenamePlan, ScanResultsFile } from './types.js';
import { loadConfig, type Config } from './config.js';
import { scanDirectory } from './scanner.js';
import { findSuspiciousTracks, trackCountByDisc } from './audiobook.js';
import { formatDuration, formatFileSize } from './metadata.js';
import { TemplateEngine } from './templates.js';
import { buildRenamePlan } from './planner.js';
import { executePlan, summarizeExecution, undoLastExecution } from './executor.js';
import { ProviderManager, listProviders } from './providers/manager.js';
import { loadCache, pruneCache, saveCache } from './cache.js';
import { promptForIdentity } from './prompts.js';
import { RenamePlanSchema, ScanResultsFileSchema } from './schemas.js';
import { ConfigError, PlanValidationError } from './errors.js';

const DATA_DIR = join(process.cwd(), 'data');
const SCAN_RESULTS_FILE = join(DATA_DIR, 'scan-results.json');
const PLAN_FILE = join(DATA_DIR, 'rename-plan.json');
const EXECUTION_LOG_FILE = join(DATA_DIR, 'execution-log.json');

function createEngine(config: Config): TemplateEngine {
  return new TemplateEngine({
    casePolicy: config.casePolicy,
    unicodeNormalize: config.unicodeNormalize,
    maxPathLength: config.maxPathLength,
    lowercaseMinorWords: config.lowercaseMinorWords,
  });
}

async function loadDataFile<T>(file: string, schema: z.ZodType<T>, hint: string): Promise<T | null> {
  if (!existsSync(file)) {
    console.error(chalk.red(`No ${basename(file)} found. ${hint}`));
    process.exitCode = 1;
    return null;
  }

  const parsed = schema.safeParse(JSON.parse(await readFile(file, 'utf-8')));

  if (!parsed.success) {
    console.error(chalk.red(`${file} is not valid: ${parsed.error.issues[0]?.message ?? 'unknown error'}`));
    process.exitCode = 1;
    return null;
  }

  return parsed.data;
}

async function saveDataFile(file: string, data: unknown): Promise<void> {
  await mkdir(DATA_DIR, { recursive: true });
  await writeFile(file, JSON.stringify(data, null, 2));
}

function printSet(set: AudiobookSet, engine: TemplateEngine, folderTemplate: string): void {
  console.log(chalk.bold(`\n📚 ${set.rawTitleGuess ?? basename(set.sourcePath)}`));
  console.log(chalk.gray(`   ${set.sourcePath}`));

  if (set.authorGuess) {
    console.log(`   Author: ${set.authorGuess}`);
  }

  if (set.seriesGuess) {
    console.log(`   Series: ${set.seriesGuess}${set.volumeGuess ? ` #${set.volumeGuess}` : ''}`);
  }

  if (set.yearGuess !== null) {
    console.log(`   Year:   ${set.yearGuess}`);
  }

  const size = set.tracks.reduce((sum, track) => sum + track.fileSize, 0);
  const perDisc = [...trackCountByDisc(set)].map(([disc, count]) => `disc ${disc}: ${count}`).join(', ');

  console.log(`   Tracks: ${set.totalTracks} (${perDisc}), ${formatFileSize(size)}, ${formatDuration(set.totalDuration)}`);
  console.log(chalk.cyan(`   → ${engine.generateFolderName(set, set.chosenIdentity, folderTemplate)}`));

  for (const track of findSuspiciousTracks(set)) {
    console.log(chalk.yellow(`   ⚠ ${basename(track.srcPath)}: ${track.duration}s`));
  }

  for (const warning of set.warnings) {
    console.log(chalk.yellow(`   ⚠ ${warning}`));
  }
}

async function runScan(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n🔍 Audiobook Scanner\n'));

  const { values, positionals } = parseArgs({
    args,
    options: {
      depth: { type: 'string', short: 'd' },
      template: { type: 'string', short: 't' },
    },
    allowPositionals: true,
  });

  const config = await loadConfig();
  const engine = createEngine(config);
  const roots = positionals.length > 0 ? positionals.map((path) => resolve(path)) : config.scanPaths;
  const maxDepth = values.depth !== undefined ? Number.parseInt(values.depth, 10) : config.maxDepth;
  const folderTemplate = values.template ?? config.folderTemplate;

  if (roots.length === 0) {
    console.error(chalk.red('No folder given and no scanPaths in config.json'));
    process.exitCode = 1;
    return;
  }

  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    console.error(chalk.red(`Invalid depth: ${values.depth}`));
    process.exitCode = 1;
    return;
  }

  const validation = engine.validateTemplate(folderTemplate);

  if (!validation.valid) {
    console.error(chalk.red(`Invalid template "${folderTemplate}":`));
    validation.errors.forEach((error) => console.error(chalk.red(`  - ${error}`)));
    process.exitCode = 1;
    return;
  }

  const sets: AudiobookSet[] = [];

  for (const root of roots) {
    const spinner = ora(`Discovering audiobooks in ${root}...`).start();

    const found = await scanDirectory(root, {
      recursive: config.recursive,
      maxDepth,
      probe: config.probeAudio ? undefined : false,
      onError: (path, error) => console.error(chalk.yellow(`\n  ⚠ ${path}: ${error.message}`)),
    });

    spinner.succeed(`Found ${found.length} audiobook(s) in ${root}`);
    sets.push(...found);
  }

  for (const set of sets) {
    printSet(set, engine, folderTemplate);
  }

  const results: ScanResultsFile = {
    scannedAt: new Date().toISOString(),
    roots,
    sets,
  };

  await saveDataFile(SCAN_RESULTS_FILE, results);

  console.log(chalk.green(`\n✓ Scan complete!`));
  console.log(chalk.gray(`  Audiobooks: ${sets.length}`));
  console.log(chalk.gray(`  Tracks: ${sets.reduce((sum, set) => sum + set.totalTracks, 0)}`));
  console.log(chalk.gray(`  Results saved to: ${SCAN_RESULTS_FILE}`));
}

async function runMatch(): Promise<void> {
  console.log(chalk.cyan('\n🔎 Metadata Matching\n'));

  const config = await loadConfig();
  const results = await loadDataFile(SCAN_RESULTS_FILE, ScanResultsFileSchema, 'Run "npm run scan" first.');

  if (!results) {
    return;
  }

  const cache = await loadCache(config.cacheFile);
  const ttlMs = config.cacheTtlHours * 60 * 60 * 1000;
  pruneCache(cache, ttlMs);

  const providerErrors: string[] = [];
  const manager = ProviderManager.fromConfig(config, {
    cache,
    onError: (provider, error) => providerErrors.push(`${provider.name}: ${error.message}`),
  });

  const providers = manager.getEnabledProviders();

  if (providers.length === 0) {
    console.log(chalk.yellow('No providers enabled; folder guesses will be used for naming.'));
  } else {
    console.log(chalk.gray(`Providers: ${providers.map((provider) => provider.name).join(', ')}\n`));

    const progressBar = new cliProgress.SingleBar({
      format: 'Looking up metadata |{bar}| {percentage}% | {value}/{total} audiobooks',
      barCompleteChar: '█',
      barIncompleteChar: '░',
    });

    progressBar.start(results.sets.length, 0);
    await manager.matchSets(results.sets, (completed) => progressBar.update(completed));
    progressBar.stop();
    await saveCache(cache, config.cacheFile);
  }

  for (const error of providerErrors) {
    console.log(chalk.yellow(`  ⚠ ${error}`));
  }

  const automatic = results.sets.filter((set) => set.chosenIdentity !== null).length;
  console.log(chalk.green(`\n✓ ${automatic} audiobook(s) matched with high confidence`));

  const pending = results.sets.filter((set) => set.chosenIdentity === null);

  if (pending.length > 0 && process.stdin.isTTY) {
    console.log(chalk.cyan(`\n${pending.length} audiobook(s) need a decision`));

    for (const set of pending) {
      const result = await promptForIdentity(set);

      if (result.action === 'quit') {
        break;
      }

      set.chosenIdentity = result.identity;
      set.skipped = result.action === 'skip';
    }
  }

  await saveDataFile(SCAN_RESULTS_FILE, results);

  const skipped = results.sets.filter((set) => set.skipped).length;
  const unmatched = results.sets.filter((set) => set.chosenIdentity === null).length - skipped;
  console.log(chalk.gray(`\n  Matched: ${results.sets.length - unmatched - skipped}`));
  console.log(chalk.gray(`  Using folder guesses: ${unmatched}`));
  console.log(chalk.gray(`  Skipped: ${skipped}`));
  console.log(chalk.gray(`  Results saved to: ${SCAN_RESULTS_FILE}`));
}

async function runPlan(): Promise<RenamePlan | null> {
  console.log(chalk.cyan('\n📝 Rename Plan\n'));

  const config = await loadConfig();
  const results = await loadDataFile(SCAN_RESULTS_FILE, ScanResultsFileSchema, 'Run "npm run scan" first.');

  if (!results) {
    return null;
  }

  const plan = buildRenamePlan(results.sets, {
    engine: createEngine(config),
    folderTemplate: config.folderTemplate,
    filenameTemplate: config.filenameTemplate,
    zeroPaddingWidth: config.zeroPaddingWidth,
    outputRoot: config.outputRoot,
    sourcePath: results.roots[0],
  });

  for (const operation of plan.operations) {
    const base = config.outputRoot ?? plan.sourcePath;
    console.log(`${chalk.gray(relative(plan.sourcePath, operation.oldPath))}`);
    console.log(`  ${chalk.green('→')} ${relative(base, operation.newPath)}`);
  }

  for (const warning of plan.warnings) {
    console.log(chalk.yellow(`⚠ ${warning}`));
  }

  for (const conflict of plan.conflicts) {
    console.log(chalk.red(`✗ ${conflict}`));
  }

  await saveDataFile(PLAN_FILE, plan);

  console.log(chalk.gray(`\n  Operations: ${plan.operations.length}`));
  console.log(chalk.gray(`  Plan saved to: ${PLAN_FILE}`));

  if (plan.conflicts.length > 0) {
    console.log(chalk.red(`\n${plan.conflicts.length} conflict(s) must be resolved before applying.`));
    process.exitCode = 1;
  }

  return plan;
}

async function runApply(): Promise<void> {
  console.log(chalk.cyan('\n🚚 Apply Rename Plan\n'));

  const config = await loadConfig();
  const plan = await loadDataFile(PLAN_FILE, RenamePlanSchema, 'Run "npm run plan" first.');

  if (!plan) {
    return;
  }

  if (plan.operations.length === 0) {
    console.log(chalk.green('Nothing to rename.'));
    return;
  }

  const proceed = await confirm({
    message: `Rename ${plan.operations.length} file(s)${config.writeTags ? ' and write tags' : ''}?`,
    default: false,
  });

  if (!proceed) {
    return;
  }

  plan.dryRun = false;

  try {
    const log = await executePlan(plan, {
      logFile: EXECUTION_LOG_FILE,
      writeTags: config.writeTags,
      showProgress: true,
    });

    summarizeExecution(log);
    console.log(chalk.gray(`  Log saved to: ${EXECUTION_LOG_FILE}`));
  } catch (error) {
    if (!(error instanceof PlanValidationError)) {
      throw error;
    }

    console.error(chalk.red('Plan cannot be applied:'));
    error.conflicts.forEach((conflict) => console.error(chalk.red(`  - ${conflict}`)));
    process.exitCode = 1;
  }
}

async function runUndo(): Promise<void> {
  console.log(chalk.cyan('\n↩️  Undo Last Execution\n'));

  const proceed = await confirm({
    message: 'Move the files of the last execution back to their original paths?',
    default: false,
  });

  if (!proceed) {
    return;
  }

  const result = await undoLastExecution(EXECUTION_LOG_FILE);

  console.log(chalk.green(`✓ Restored ${result.restored} file(s) from plan ${result.planId}`));

  for (const skipped of result.skipped) {
    console.log(chalk.yellow(`  ⚠ Skipped ${skipped}`));
  }
}

async function runValidateTemplate(args: string[]): Promise<void> {
  const [template] = args;

  if (!template) {
    console.error(chalk.red('Usage: validate-template "<template>"'));
    process.exitCode = 1;
    return;
  }

  const config = await loadConfig();
  const { valid, errors } = createEngine(config).validateTemplate(template);

  if (valid) {
    console.log(chalk.green(`✓ Template is valid: ${template}`));
    return;
  }

  console.error(chalk.red(`✗ Template is invalid: ${template}`));
  errors.forEach((error) => console.error(chalk.red(`  - ${error}`)));
  process.exitCode = 1;
}

async function runProviders(): Promise<void> {
  const config = await loadConfig();

  for (const provider of listProviders(config)) {
    const status = provider.enabled ? chalk.green('enabled') : chalk.gray('disabled');
    console.log(`${provider.name.padEnd(14)} ${status}  ${chalk.gray(provider.description)}`);
  }
}

async function runAll(args: string[]): Promise<void> {
  await runScan(args);

  if (process.exitCode) {
    return;
  }

  const match = await confirm({
    message: '\nContinue to metadata matching?',
    default: true,
  });

  if (!match) {
    return;
  }

  await runMatch();

  const plan = await runPlan();

  if (!plan || plan.conflicts.length > 0) {
    return;
  }

  await runApply();

  console.log(chalk.green('\n✓ Done!'));
}

function handleError(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Invalid configuration in ${error.path}:`));
    error.issues.forEach((issue) => console.error(chalk.red(`  - ${issue}`)));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }

  process.exitCode = 1;
}

const [command, ...rest] = process.argv.slice(2);

switch (command) {
  case 'scan':
    runScan(rest).catch(handleError);
    break;

  case 'match':
    runMatch().catch(handleError);
    break;

  case 'plan':
    runPlan().catch(handleError);
    break;

  case 'apply':
    runApply().catch(handleError);
    break;

  case 'undo':
    runUndo().catch(handleError);
    break;

  case 'validate-template':
    runValidateTemplate(rest).catch(handleError);
    break;

  case 'providers':
    runProviders().catch(handleError);
    break;

  default:
    runAll(command ? [command, ...rest] : rest).catch(handleError);
}
