import * as fs from 'fs'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { backoffDelay, sleep } from '@kube-agent-cloud/shared/time-utils'

/**
 * In-process mutex keyed by string. Callers for the same key run one at a time
 * in arrival order; different keys never wait on each other.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>()

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(fn)
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)

    try {
      return await result
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }
}

export interface FileLockOptions {
  timeoutMs?: number
  staleMs?: number
  sleep?: (ms: number) => Promise<void>
}

const defaultFileLockOptions: Required<FileLockOptions> = {
  timeoutMs: 60000,
  staleMs: 600000,
  sleep
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

let takeovers = 0

/**
 * Remove a lock file seen as stale. The file is first renamed to a name only
 * this caller uses, so of several waiters only one removes it. If what was
 * moved is no longer the stale file, it is linked back in place.
 */
export async function takeOverStaleLock(
  lockPath: string,
  stale: fs.Stats
): Promise<void> {
  const claimed = `${lockPath}.${process.pid}.${++takeovers}.stale`
  try {
    await fs.promises.rename(lockPath, claimed)
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return
    }
    throw error
  }

  try {
    const moved = await fs.promises.stat(claimed)
    if (moved.ino !== stale.ino || moved.mtimeMs !== stale.mtimeMs) {
      await fs.promises.link(claimed, lockPath)
    }
  } finally {
    await fs.promises.rm(claimed, { force: true })
  }
}

/**
 * Cross-process exclusion through an O_EXCL lock file. Lock files older than
 * `staleMs` are treated as left behind by a crashed run and taken over.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const opts = { ...defaultFileLockOptions, ...options }
  const startTime = Date.now()
  let attempt = 0

  for (;;) {
    try {
      const handle = await fs.promises.open(lockPath, 'wx', 0o600)
      await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`)
      await handle.close()
      break
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw new Error(
          `Failed to create lock file ${lockPath}: ${errorMessage(error)}`
        )
      }
    }

    const stat = await fs.promises.stat(lockPath).catch(() => null)
    if (stat && Date.now() - stat.mtimeMs > opts.staleMs) {
      await takeOverStaleLock(lockPath, stat)
      continue
    }

    if (Date.now() - startTime > opts.timeoutMs) {
      throw new Error(
        `Timed out after ${opts.timeoutMs}ms waiting for lock ${lockPath}`
      )
    }

    attempt++
    await opts.sleep(backoffDelay(attempt, 100, 2000))
  }

  try {
    return await fn()
  } finally {
    await fs.promises.rm(lockPath, { force: true })
  }
}
