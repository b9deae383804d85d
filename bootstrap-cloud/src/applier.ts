import * as core from '@actions/core'
import type { KubernetesObject } from '@kubernetes/client-node'
import {
  KubernetesClient,
  ManifestObject,
  ResourceRef
} from '@kube-agent-cloud/k8s-client'
import { errorMessage, statusCodeOf } from '@kube-agent-cloud/shared/errors'
import {
  backoffDelay,
  sleep,
  withTimeout
} from '@kube-agent-cloud/shared/time-utils'
import { ApplyFailedError, ApplyFailureKind } from './errors'
import { describeRef, refOf, sortByDependency } from './resources'
import {
  AppliedObject,
  AppliedSet,
  ApplyOutcome,
  ResourceObject
} from './types'

/**
 * Read/create/update access to cluster objects
 */
export interface ResourceStore {
  read(ref: ResourceRef): Promise<KubernetesObject | null>
  create(manifest: ManifestObject): Promise<void>
  update(manifest: ManifestObject): Promise<void>
}

export function clusterStore(client: KubernetesClient): ResourceStore {
  return {
    read: (ref) => client.readObject(ref),
    create: (manifest) => client.createObject(manifest),
    update: (manifest) => client.applyObject(manifest)
  }
}

export interface ApplierOptions {
  readyTimeoutMs?: number
  /**
   * Bound on each read, create or update call
   */
  requestTimeoutMs?: number
  pollIntervalMs?: number
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

const defaultOptions: Required<ApplierOptions> = {
  readyTimeoutMs: 30000,
  requestTimeoutMs: 30000,
  pollIntervalMs: 500,
  sleep,
  now: Date.now
}

class ObjectNotReadyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ObjectNotReadyError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * True when every field of `desired` is present with the same value in `live`.
 * Fields only the server sets (status, uid, defaults) are ignored.
 */
export function isSubset(desired: unknown, live: unknown): boolean {
  if (Array.isArray(desired)) {
    return (
      Array.isArray(live) &&
      desired.length === live.length &&
      desired.every((item, index) => isSubset(item, live[index]))
    )
  }
  if (isRecord(desired)) {
    return (
      isRecord(live) &&
      Object.entries(desired).every(([key, value]) =>
        isSubset(value, live[key])
      )
    )
  }
  return desired === live
}

/**
 * Whether a live object is usable by objects that reference it
 */
export function isObservedReady(live: KubernetesObject): boolean {
  if (live.kind === 'Namespace') {
    const status = 'status' in live ? live.status : undefined
    return isRecord(status) && status.phase === 'Active'
  }
  return true
}

export function classifyApplyError(error: unknown): ApplyFailureKind {
  const statusCode = statusCodeOf(error)

  if (statusCode === 401 || statusCode === 403) {
    return 'permission-denied'
  }
  if (statusCode === null || statusCode === 429 || statusCode >= 500) {
    return 'transient'
  }
  return 'rejected'
}

/**
 * Converges cluster objects one at a time in dependency order.
 * Not transactional: a failure keeps what was applied before it.
 */
export class ResourceApplier {
  private readonly store: ResourceStore
  private readonly options: Required<ApplierOptions>

  constructor(store: ResourceStore, options: ApplierOptions = {}) {
    this.store = store
    this.options = { ...defaultOptions, ...options }
  }

  async apply(objects: ResourceObject[]): Promise<AppliedSet> {
    const applied: AppliedObject[] = []

    for (const object of sortByDependency(objects)) {
      const ref = refOf(object)
      let outcome: ApplyOutcome

      try {
        outcome = await this.applyOne(object)
      } catch (error: unknown) {
        const failure =
          error instanceof ObjectNotReadyError
            ? 'not-ready'
            : classifyApplyError(error)
        throw new ApplyFailedError([...applied], ref, failure, errorMessage(error), {
          cause: error
        })
      }

      applied.push({ ref, outcome })
    }

    return { objects: applied }
  }

  private bounded<T>(promise: Promise<T>, message: string): Promise<T> {
    return withTimeout(promise, this.options.requestTimeoutMs, message)
  }

  private read(ref: ResourceRef): Promise<KubernetesObject | null> {
    return this.bounded(
      this.store.read(ref),
      `Timed out reading ${describeRef(ref)}`
    )
  }

  private async applyOne(object: ResourceObject): Promise<ApplyOutcome> {
    const ref = refOf(object)
    const live = await this.read(ref)

    if (live && isSubset(object.manifest, live)) {
      if (!isObservedReady(live)) {
        await this.waitForReady(ref)
      }
      core.info(`ℹ️ ${describeRef(ref)} unchanged`)
      return 'unchanged'
    }

    if (live) {
      await this.bounded(
        this.store.update(object.manifest),
        `Timed out updating ${describeRef(ref)}`
      )
    } else {
      await this.bounded(
        this.store.create(object.manifest),
        `Timed out creating ${describeRef(ref)}`
      )
    }
    await this.waitForReady(ref)

    return live ? 'updated' : 'created'
  }

  /**
   * Poll until the object is readable and ready, with a bounded wait
   */
  private async waitForReady(ref: ResourceRef): Promise<void> {
    const startTime = this.options.now()
    let attempt = 0

    while (this.options.now() - startTime < this.options.readyTimeoutMs) {
      const live = await this.read(ref)
      if (live && isObservedReady(live)) {
        return
      }
      attempt++
      await this.options.sleep(
        backoffDelay(attempt, this.options.pollIntervalMs, 5000)
      )
    }

    throw new ObjectNotReadyError(
      `${describeRef(ref)} was not observed ready within ${this.options.readyTimeoutMs}ms`
    )
  }
}
