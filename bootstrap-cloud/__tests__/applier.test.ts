import { describe, it, expect, vi, beforeEach } from 'vitest'
import * as core from '@actions/core'
import type { KubernetesObject } from '@kubernetes/client-node'
import type { ManifestObject, ResourceRef } from '@kube-agent-cloud/k8s-client'
import {
  ResourceApplier,
  ResourceStore,
  classifyApplyError,
  isObservedReady,
  isSubset
} from '../src/applier'
import { ApplyFailedError } from '../src/errors'
import { buildResourceObjects } from '../src/resources'
import { desiredState } from './fixtures'

function keyOf(ref: ResourceRef): string {
  return `${ref.kind}/${ref.namespace ?? ''}/${ref.name}`
}

/**
 * In-memory API server: stores manifests and fills in server-side fields
 */
class FakeStore implements ResourceStore {
  readonly objects = new Map<string, KubernetesObject>()
  readonly failures = new Map<string, unknown>()
  namespacePhase = 'Active'

  async read(ref: ResourceRef): Promise<KubernetesObject | null> {
    const live = this.objects.get(keyOf(ref))
    return live ? structuredClone(live) : null
  }

  async create(manifest: ManifestObject): Promise<void> {
    this.write(manifest)
  }

  async update(manifest: ManifestObject): Promise<void> {
    this.write(manifest)
  }

  private write(manifest: ManifestObject): void {
    const key = keyOf({
      kind: manifest.kind,
      name: manifest.metadata.name,
      namespace: manifest.metadata.namespace
    })
    const failure = this.failures.get(key)
    if (failure) {
      throw failure
    }

    const live: KubernetesObject = {
      ...structuredClone(manifest),
      metadata: { ...manifest.metadata, uid: `uid-${this.objects.size}` }
    }
    if (manifest.kind === 'Namespace') {
      Object.assign(live, { status: { phase: this.namespacePhase } })
    }
    this.objects.set(key, live)
  }
}

describe('ResourceApplier', () => {
  let store: FakeStore

  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(core, 'info').mockImplementation(() => {})
    store = new FakeStore()
  })

  it('should create every object on the first run', async () => {
    const applier = new ResourceApplier(store)

    const result = await applier.apply(buildResourceObjects(desiredState()))

    expect(result.objects).toEqual([
      { ref: { kind: 'Namespace', name: 'jenkins' }, outcome: 'created' },
      {
        ref: { kind: 'ServiceAccount', name: 'jenkins', namespace: 'jenkins' },
        outcome: 'created'
      },
      { ref: { kind: 'ClusterRole', name: 'jenkins' }, outcome: 'created' },
      {
        ref: { kind: 'ClusterRoleBinding', name: 'jenkins' },
        outcome: 'created'
      },
      {
        ref: { kind: 'PodTemplate', name: 'jnlp-agent', namespace: 'jenkins' },
        outcome: 'created'
      }
    ])
    expect(store.objects.size).toBe(5)
  })

  it('should report every object unchanged on a second run', async () => {
    const applier = new ResourceApplier(store)
    const objects = buildResourceObjects(desiredState())
    await applier.apply(objects)
    const createSpy = vi.spyOn(store, 'create')
    const updateSpy = vi.spyOn(store, 'update')

    const result = await applier.apply(objects)

    expect(result.objects.map((o) => o.outcome)).toEqual([
      'unchanged',
      'unchanged',
      'unchanged',
      'unchanged',
      'unchanged'
    ])
    expect(createSpy).not.toHaveBeenCalled()
    expect(updateSpy).not.toHaveBeenCalled()
    expect(core.info).toHaveBeenCalledWith("ℹ️ Namespace 'jenkins' unchanged")
  })

  it('should update only the objects that drifted', async () => {
    const applier = new ResourceApplier(store)
    await applier.apply(buildResourceObjects(desiredState()))

    const changed = desiredState({
      podTemplate: {
        ...desiredState().podTemplate,
        image: 'jenkins/inbound-agent:3283.v92c105e0f819-1'
      }
    })
    const result = await applier.apply(buildResourceObjects(changed))

    expect(result.objects.map((o) => o.outcome)).toEqual([
      'unchanged',
      'unchanged',
      'unchanged',
      'unchanged',
      'updated'
    ])
  })

  it('should keep applied objects and resume after a failure', async () => {
    const applier = new ResourceApplier(store)
    const objects = buildResourceObjects(desiredState())
    store.failures.set(
      'ClusterRole//jenkins',
      Object.assign(new Error('clusterroles is forbidden'), { code: 403 })
    )

    const error = await applier.apply(objects).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApplyFailedError)
    if (!(error instanceof ApplyFailedError)) return
    expect(error.message).toBe(
      "Failed to apply ClusterRole 'jenkins' (permission-denied): clusterroles is forbidden"
    )
    expect(error.failedAt).toEqual({ kind: 'ClusterRole', name: 'jenkins' })
    expect(error.failure).toBe('permission-denied')
    expect(error.retryable).toBe(false)
    expect(error.exitCode).toBe(3)
    expect(error.applied).toEqual([
      { ref: { kind: 'Namespace', name: 'jenkins' }, outcome: 'created' },
      {
        ref: { kind: 'ServiceAccount', name: 'jenkins', namespace: 'jenkins' },
        outcome: 'created'
      }
    ])
    expect(store.objects.size).toBe(2)

    store.failures.clear()
    const result = await applier.apply(objects)

    expect(result.objects.map((o) => o.outcome)).toEqual([
      'unchanged',
      'unchanged',
      'created',
      'created',
      'created'
    ])
  })

  it('should give up on a read the API server never answers', async () => {
    vi.spyOn(store, 'read').mockReturnValue(new Promise(() => {}))
    const applier = new ResourceApplier(store, {
      requestTimeoutMs: 20,
      readyTimeoutMs: 100
    })

    const error = await applier
      .apply(buildResourceObjects(desiredState()))
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApplyFailedError)
    if (!(error instanceof ApplyFailedError)) return
    expect(error.failure).toBe('transient')
    expect(error.retryable).toBe(true)
    expect(error.applied).toEqual([])
    expect(error.message).toBe(
      "Failed to apply Namespace 'jenkins' (transient): Timed out reading Namespace 'jenkins' (after 20ms)"
    )
  })

  it('should give up on a create the API server never answers', async () => {
    const applier = new ResourceApplier(store, { requestTimeoutMs: 20 })
    const create = store.create.bind(store)
    vi.spyOn(store, 'create').mockImplementation((manifest) =>
      manifest.kind === 'ClusterRole' ? new Promise(() => {}) : create(manifest)
    )

    const error = await applier
      .apply(buildResourceObjects(desiredState()))
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApplyFailedError)
    if (!(error instanceof ApplyFailedError)) return
    expect(error.message).toBe(
      "Failed to apply ClusterRole 'jenkins' (transient): Timed out creating ClusterRole 'jenkins' (after 20ms)"
    )
    expect(error.applied.map((o) => o.ref.kind)).toEqual([
      'Namespace',
      'ServiceAccount'
    ])
  })

  it('should fail as not-ready when a namespace never becomes active', async () => {
    store.namespacePhase = 'Terminating'
    let clock = 0
    const applier = new ResourceApplier(store, {
      readyTimeoutMs: 1000,
      sleep: vi.fn().mockResolvedValue(undefined),
      now: () => (clock += 400)
    })

    const error = await applier
      .apply(buildResourceObjects(desiredState()))
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ApplyFailedError)
    if (!(error instanceof ApplyFailedError)) return
    expect(error.failure).toBe('not-ready')
    expect(error.retryable).toBe(true)
    expect(error.applied).toEqual([])
    expect(error.message).toBe(
      "Failed to apply Namespace 'jenkins' (not-ready): Namespace 'jenkins' was not observed ready within 1000ms"
    )
  })
})

describe('isSubset', () => {
  it('should ignore fields only the server sets', () => {
    expect(
      isSubset(
        { metadata: { name: 'jenkins' } },
        { metadata: { name: 'jenkins', uid: 'abc' }, status: {} }
      )
    ).toBe(true)
  })

  it('should detect changed values', () => {
    expect(
      isSubset({ spec: { image: 'a' } }, { spec: { image: 'b' } })
    ).toBe(false)
  })

  it('should require arrays of the same length', () => {
    expect(isSubset({ verbs: ['get'] }, { verbs: ['get', 'list'] })).toBe(false)
    expect(isSubset({ verbs: ['get'] }, { verbs: ['get'] })).toBe(true)
  })

  it('should treat missing fields as drift', () => {
    expect(isSubset({ rules: [] }, {})).toBe(false)
  })
})

describe('isObservedReady', () => {
  it('should require an active namespace', () => {
    expect(
      isObservedReady({
        kind: 'Namespace',
        metadata: { name: 'jenkins' },
        status: { phase: 'Active' }
      } as KubernetesObject)
    ).toBe(true)
    expect(
      isObservedReady({ kind: 'Namespace', metadata: { name: 'jenkins' } })
    ).toBe(false)
  })

  it('should treat other kinds as ready once readable', () => {
    expect(
      isObservedReady({ kind: 'ServiceAccount', metadata: { name: 'jenkins' } })
    ).toBe(true)
  })
})

describe('classifyApplyError', () => {
  it('should classify authorization failures', () => {
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 401 }))).toBe(
      'permission-denied'
    )
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 403 }))).toBe(
      'permission-denied'
    )
  })

  it('should classify retryable failures as transient', () => {
    expect(classifyApplyError(new Error('socket hang up'))).toBe('transient')
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 429 }))).toBe(
      'transient'
    )
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 503 }))).toBe(
      'transient'
    )
  })

  it('should classify invalid objects and conflicts as rejected', () => {
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 400 }))).toBe(
      'rejected'
    )
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 409 }))).toBe(
      'rejected'
    )
    expect(classifyApplyError(Object.assign(new Error('x'), { code: 422 }))).toBe(
      'rejected'
    )
  })
})
