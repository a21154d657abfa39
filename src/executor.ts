import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type { ExecutionLog, OperationRecord, RenameOperation, RenamePlan } from './types.js';
import { ExecutionLogSchema } from './schemas.js';
import { PlanValidationError, toError } from './errors.js';
import { tempPathFor, validatePlan } from './planner.js';
import { writeTags, type TagWriter } from './writer.js';

export interface ExecuteOptions {
  logFile: string;
  writeTags?: boolean;
  tagWriter?: TagWriter;
  caseInsensitive?: boolean;
  showProgress?: boolean;
}

export interface UndoOptions {
  verifyHashes?: boolean;
}

export interface UndoResult {
  planId: string;
  restored: number;
  skipped: string[];
}

const ExecutionHistorySchema = z.array(ExecutionLogSchema);

export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');

  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }

  return hash.digest('hex');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function loadExecutionHistory(logFile: string): Promise<ExecutionLog[]> {
  if (!(await pathExists(logFile))) {
    return [];
  }

  const data = await readFile(logFile, 'utf-8');
  const parsed = ExecutionHistorySchema.safeParse(JSON.parse(data));

  if (!parsed.success) {
    throw new Error(`Execution log ${logFile} is not valid: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
  }

  return parsed.data;
}

async function saveExecutionHistory(logFile: string, history: ExecutionLog[]): Promise<void> {
  await mkdir(dirname(logFile), { recursive: true });
  await writeFile(logFile, JSON.stringify(history, null, 2));
}

async function appendExecutionLog(logFile: string, log: ExecutionLog): Promise<void> {
  const history = await loadExecutionHistory(logFile);
  history.push(log);
  await saveExecutionHistory(logFile, history);
}

function createRecord(plan: RenamePlan, index: number, operation: RenameOperation): OperationRecord {
  return {
    operationId: `${plan.planId}-${index + 1}`,
    timestamp: new Date().toISOString(),
    operationType: 'rename',
    oldPath: operation.oldPath,
    newPath: operation.newPath,
    oldTags: operation.track.existingTags,
    newTags: null,
    oldContentHash: null,
    newContentHash: null,
    success: false,
    metadata: {
      tempPath: operation.tempPath,
      disc: operation.track.disc,
      trackIndex: operation.track.trackIndex,
    },
  };
}

/**
 * Targets must be free, except where another operation of the same plan moves
 * its file away first.
 */
async function findOccupiedTargets(plan: RenamePlan): Promise<string[]> {
  const vacated = new Set(plan.operations.map((operation) => operation.oldPath));
  const occupied: string[] = [];

  for (const operation of plan.operations) {
    if (!vacated.has(operation.newPath) && (await pathExists(operation.newPath))) {
      occupied.push(`Target already exists: ${operation.newPath}`);
    }
  }

  return occupied;
}

interface Move {
  operation: RenameOperation;
  tempPath: string;
  stage: 'temp' | 'final';
}

async function rollback(moves: Move[]): Promise<string[]> {
  const failures: string[] = [];

  for (const move of [...moves].reverse()) {
    const from = move.stage === 'final' ? move.operation.newPath : move.tempPath;

    try {
      await mkdir(dirname(move.operation.oldPath), { recursive: true });
      await rename(from, move.operation.oldPath);
    } catch (error) {
      failures.push(`${from}: ${toError(error).message}`);
    }
  }

  return failures;
}

/**
 * Applies a validated plan. Every file is first moved to its temporary name and
 * then to its destination, so renames within one plan may swap names. Any
 * failure moves the files already handled back to where they were.
 */
export async function executePlan(plan: RenamePlan, options: ExecuteOptions): Promise<ExecutionLog> {
  if (!validatePlan(plan, { caseInsensitive: options.caseInsensitive })) {
    throw new PlanValidationError(plan.conflicts);
  }

  const occupied = await findOccupiedTargets(plan);

  if (occupied.length > 0) {
    throw new PlanValidationError(occupied);
  }

  const tagWriter = options.tagWriter ?? writeTags;
  const records = plan.operations.map((operation, index) => createRecord(plan, index, operation));
  const moves: Move[] = [];
  const log: ExecutionLog = {
    planId: plan.planId,
    executedAt: new Date().toISOString(),
    records,
    rolledBack: false,
  };

  const bar = options.showProgress
    ? new cliProgress.SingleBar(
        { format: 'Renaming |{bar}| {value}/{total}', hideCursor: true },
        cliProgress.Presets.shades_classic
      )
    : null;

  bar?.start(plan.operations.length * 2, 0);

  let current = 0;

  try {
    for (const [index, operation] of plan.operations.entries()) {
      const record = records[index];
      current = index;
      const tempPath = operation.tempPath ?? tempPathFor(operation.oldPath, plan.planId);

      record.oldContentHash = await hashFile(operation.oldPath);
      await rename(operation.oldPath, tempPath);
      moves.push({ operation, tempPath, stage: 'temp' });
      bar?.increment();
    }

    for (const [index, move] of moves.entries()) {
      const { operation } = move;
      const record = records[index];
      current = index;

      await mkdir(dirname(operation.newPath), { recursive: true });
      await rename(move.tempPath, operation.newPath);
      move.stage = 'final';

      record.newContentHash = await hashFile(operation.newPath);
      record.success = true;
      bar?.increment();
    }
  } catch (error) {
    const failed = records[current];

    if (failed) {
      failed.error = toError(error).message;
    }

    for (const record of records) {
      record.success = false;
    }

    const failures = await rollback(moves);
    log.rolledBack = true;
    bar?.stop();

    if (failed && failures.length > 0) {
      failed.metadata.rollbackFailures = failures;
    }

    await appendExecutionLog(options.logFile, log);
    throw toError(error);
  }

  bar?.stop();

  if (options.writeTags) {
    for (const operation of plan.operations) {
      const tags = operation.track.proposedTags;

      if (!tags) {
        continue;
      }

      const record: OperationRecord = {
        operationId: `${plan.planId}-${records.length + 1}`,
        timestamp: new Date().toISOString(),
        operationType: 'retag',
        oldPath: operation.newPath,
        newPath: operation.newPath,
        oldTags: operation.track.existingTags,
        newTags: tags,
        oldContentHash: await hashFile(operation.newPath),
        newContentHash: null,
        success: false,
        metadata: {},
      };

      try {
        await tagWriter(operation.newPath, tags);
        record.newContentHash = await hashFile(operation.newPath);
        record.success = true;
      } catch (error) {
        record.error = toError(error).message;
      }

      records.push(record);
    }
  }

  await appendExecutionLog(options.logFile, log);

  return log;
}

/**
 * Moves the files of the most recent execution that has not been rolled back
 * to their original paths. Files changed since the rename, or whose original
 * path is taken again, are skipped. Written tags are not reverted.
 */
export async function undoLastExecution(logFile: string, options: UndoOptions = {}): Promise<UndoResult> {
  const verifyHashes = options.verifyHashes ?? true;
  const history = await loadExecutionHistory(logFile);
  const log = [...history].reverse().find((entry) => !entry.rolledBack);

  if (!log) {
    throw new Error('No execution to undo');
  }

  const expectedHashes = new Map<string, string | null>();

  for (const record of log.records) {
    if (record.success && record.newPath) {
      expectedHashes.set(record.newPath, record.newContentHash);
    }
  }

  const result: UndoResult = { planId: log.planId, restored: 0, skipped: [] };
  const renames = log.records.filter((record) => record.operationType === 'rename' && record.success);

  for (const record of renames.reverse()) {
    const { oldPath, newPath } = record;

    if (!oldPath || !newPath) {
      continue;
    }

    if (!(await pathExists(newPath))) {
      result.skipped.push(`${newPath}: file no longer exists`);
      continue;
    }

    const expected = expectedHashes.get(newPath);

    if (verifyHashes && expected && (await hashFile(newPath)) !== expected) {
      result.skipped.push(`${newPath}: content changed since it was renamed`);
      continue;
    }

    if (await pathExists(oldPath)) {
      result.skipped.push(`${newPath}: original path ${oldPath} is occupied`);
      continue;
    }

    await mkdir(dirname(oldPath), { recursive: true });
    await rename(newPath, oldPath);
    result.restored++;
  }

  log.rolledBack = true;
  await saveExecutionHistory(logFile, history);

  return result;
}

export function summarizeExecution(log: ExecutionLog): void {
  const renames = log.records.filter((record) => record.operationType === 'rename');
  const retags = log.records.filter((record) => record.operationType === 'retag');
  const failed = log.records.filter((record) => !record.success && record.error);

  console.log(chalk.cyan('\nExecution Summary'));
  console.log(chalk.gray('─'.repeat(40)));
  console.log(`Renames: ${renames.filter((record) => record.success).length}/${renames.length} successful`);

  if (retags.length > 0) {
    console.log(`Tags written: ${retags.filter((record) => record.success).length}/${retags.length}`);
  }

  if (log.rolledBack) {
    console.log(chalk.yellow('All renames were rolled back'));
  }

  for (const record of failed) {
    console.log(chalk.red(`  - ${record.oldPath}: ${record.error}`));
  }
}
