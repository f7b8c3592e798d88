import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import { z } from 'zod';
import { consoleLogger, type SyncLogger } from '../reconcile/logger.js';
import { SyncStateSchema, type SyncState } from './types.js';

/**
 * Default path for sync state file
 */
export const DEFAULT_STATE_PATH = '.spec-sync/state.json';

/**
 * Lock file extension
 */
const LOCK_EXTENSION = '.lock';

/**
 * Maximum lock wait time in milliseconds
 */
const MAX_LOCK_WAIT_MS = 30000;

/**
 * Lock file retry interval in milliseconds
 */
const LOCK_RETRY_INTERVAL_MS = 100;

/**
 * Stale lock threshold in milliseconds (5 minutes)
 */
const STALE_LOCK_THRESHOLD_MS = 5 * 60 * 1000;

const LockFileSchema = z.object({
  id: z.string(),
  pid: z.number().optional(),
  timestamp: z.string().optional(),
});

export interface LockOptions {
  maxWaitMs?: number;
  retryIntervalMs?: number;
  staleAfterMs?: number;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
}

/**
 * Create an empty sync state
 */
export function createEmptySyncState(): SyncState {
  return {
    version: '1.0.0',
    lastSyncAt: undefined,
    entities: {},
    fieldIds: {},
  };
}

/**
 * Get the lock file path for a state file
 */
function getLockPath(statePath: string): string {
  return resolvePath(statePath) + LOCK_EXTENSION;
}

/**
 * Check if a lock file is stale (older than threshold). A lock that
 * cannot be stat'ed is treated as stale.
 */
function isLockStale(lockPath: string, staleAfterMs: number): boolean {
  try {
    const stats = fs.statSync(lockPath);
    return Date.now() - stats.mtimeMs > staleAfterMs;
  } catch {
    return true;
  }
}

/**
 * Acquire a lock for the state file
 * Uses exclusive file creation to ensure atomicity
 *
 * @returns The lock ID (for releasing)
 * @throws Error if lock cannot be acquired within timeout
 */
export async function acquireLock(statePath: string, options: LockOptions = {}): Promise<string> {
  const {
    maxWaitMs = MAX_LOCK_WAIT_MS,
    retryIntervalMs = LOCK_RETRY_INTERVAL_MS,
    staleAfterMs = STALE_LOCK_THRESHOLD_MS,
  } = options;
  const lockPath = getLockPath(statePath);
  const lockId = crypto.randomUUID();
  const startTime = Date.now();

  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  while (true) {
    try {
      fs.writeFileSync(lockPath, JSON.stringify({
        id: lockId,
        pid: process.pid,
        timestamp: new Date().toISOString(),
      }), { flag: 'wx' });
      return lockId;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error;
      }

      if (isLockStale(lockPath, staleAfterMs)) {
        try {
          fs.unlinkSync(lockPath);
          continue;
        } catch (unlinkError) {
          // another process removed it first
          if (!isErrnoException(unlinkError) || unlinkError.code !== 'ENOENT') {
            throw unlinkError;
          }
        }
      }

      if (Date.now() - startTime > maxWaitMs) {
        throw new Error(`Failed to acquire lock for ${statePath}: timeout after ${maxWaitMs}ms`);
      }

      await new Promise(resolve => setTimeout(resolve, retryIntervalMs));
    }
  }
}

/**
 * Release a lock for the state file
 *
 * @param lockId - The lock ID from acquireLock; the lock is left alone if another holder owns it
 */
export function releaseLock(statePath: string, lockId?: string, logger: SyncLogger = consoleLogger): void {
  const lockPath = getLockPath(statePath);

  try {
    if (lockId) {
      const lockData = LockFileSchema.safeParse(JSON.parse(fs.readFileSync(lockPath, 'utf-8')));
      if (lockData.success && lockData.data.id !== lockId) {
        logger.warn(`Lock ID mismatch: expected ${lockId}, got ${lockData.data.id}`);
        return;
      }
    }
    fs.unlinkSync(lockPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    logger.warn(`Could not release lock ${lockPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Read the sync state file
 *
 * @returns The sync state, or an empty state if the file doesn't exist or is corrupt
 */
export function readSyncState(statePath: string = DEFAULT_STATE_PATH, logger: SyncLogger = consoleLogger): SyncState {
  const absolutePath = resolvePath(statePath);

  if (!fs.existsSync(absolutePath)) {
    return createEmptySyncState();
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');

  let state: SyncState;
  try {
    state = SyncStateSchema.parse(JSON.parse(content));
  } catch (error) {
    logger.warn(`Warning: Could not parse sync state file, starting fresh: ${error instanceof Error ? error.message : String(error)}`);
    return createEmptySyncState();
  }

  // Mappings are hints; lookups by natural key still decide what exists
  for (const issue of verifyStateIntegrity(state).issues) {
    logger.warn(`Warning: Sync state ${absolutePath}: ${issue}`);
  }
  return state;
}

/**
 * Write the sync state to file using atomic write (temp file + rename)
 */
export function writeSyncState(state: SyncState, statePath: string = DEFAULT_STATE_PATH): void {
  const absolutePath = resolvePath(statePath);

  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.${crypto.randomUUID()}.tmp`;

  try {
    fs.writeFileSync(tempPath, JSON.stringify(state, null, 2), 'utf-8');
    fs.renameSync(tempPath, absolutePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Verify state integrity: keys and kinds agree, no remote id is mapped twice
 */
export function verifyStateIntegrity(state: SyncState): {
  valid: boolean;
  issues: string[];
} {
  const issues: string[] = [];
  const owners = new Map<string, string>();

  for (const [key, mapping] of Object.entries(state.entities)) {
    if (!key.startsWith(`${mapping.kind}/`)) {
      issues.push(`Mapping '${key}' is recorded as kind '${mapping.kind}'`);
    }

    const existing = owners.get(mapping.externalId);
    if (existing) {
      issues.push(`Remote item ${mapping.externalId} is mapped to both '${existing}' and '${key}'`);
    } else {
      owners.set(mapping.externalId, key);
    }
  }

  return {
    valid: issues.length === 0,
    issues,
  };
}
