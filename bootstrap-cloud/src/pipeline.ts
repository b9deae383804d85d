import * as core from '@actions/core'
import type { ProbeResult, ResourceRef } from '@kube-agent-cloud/k8s-client'
import {
  CredentialUnavailableError,
  PreconditionFailedError,
  RenderInvalidError,
  RunCancelledError,
  Stage
} from './errors'
import type { MaterializeOptions } from './credentials'
import { render } from './renderer'
import { buildResourceObjects, describeRef } from './resources'
import {
  ActivationResult,
  AppliedSet,
  ControllerConfigDocument,
  DesiredState,
  MaterializedCredential,
  ResourceObject,
  RunReport
} from './types'

export interface PipelineDependencies {
  probe(): Promise<ProbeResult>
  applier: { apply(objects: ResourceObject[]): Promise<AppliedSet> }
  materializer: {
    materialize(
      serviceAccount: string,
      namespace: string,
      ttlMs: number,
      options?: MaterializeOptions
    ): Promise<MaterializedCredential>
  }
  activator: {
    activate(document: ControllerConfigDocument): Promise<ActivationResult>
  }
  now?: () => Date
}

function checkpoint(stage: Stage, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError(stage)
  }
}

async function inGroup<T>(name: string, fn: () => Promise<T>): Promise<T> {
  core.startGroup(name)
  try {
    return await fn()
  } finally {
    core.endGroup()
  }
}

/**
 * Objects the controller configuration points at
 */
export function referencedResources(desired: DesiredState): ResourceRef[] {
  return [
    { kind: 'Namespace', name: desired.namespace },
    {
      kind: 'ServiceAccount',
      name: desired.serviceAccount,
      namespace: desired.namespace
    }
  ]
}

export function assertReferencesApplied(
  desired: DesiredState,
  applied: AppliedSet
): void {
  for (const ref of referencedResources(desired)) {
    const found = applied.objects.some(
      (object) =>
        object.ref.kind === ref.kind &&
        object.ref.name === ref.name &&
        object.ref.namespace === ref.namespace
    )
    if (!found) {
      throw new RenderInvalidError(
        ref.kind === 'Namespace' ? 'namespace' : 'serviceAccount',
        `${describeRef(ref)} has not been applied`
      )
    }
  }
}

/**
 * Tokens bound to a service account die with it, so one created in this run
 * needs a fresh token
 */
export function credentialOptions(
  desired: DesiredState,
  applied: AppliedSet
): MaterializeOptions {
  const recreated = applied.objects.some(
    (object) =>
      object.ref.kind === 'ServiceAccount' &&
      object.ref.name === desired.serviceAccount &&
      object.ref.namespace === desired.namespace &&
      object.outcome === 'created'
  )
  return recreated
    ? {
        cluster: desired.externalEndpoint,
        reissueReason: 'service account was created in this run'
      }
    : { cluster: desired.externalEndpoint }
}

/**
 * Drive the cluster and the controller to the desired state.
 *
 * Stages run in order and each one must succeed before the next starts.
 * Nothing is rolled back on failure; re-running resumes from converged state.
 */
export async function reconcile(
  desired: DesiredState,
  deps: PipelineDependencies,
  signal?: AbortSignal
): Promise<RunReport> {
  const now = deps.now ?? (() => new Date())

  checkpoint('probe', signal)
  const probe = await inGroup('Verifying Kubernetes connectivity', () =>
    deps.probe()
  )
  if (probe.status !== 'ready') {
    throw new PreconditionFailedError(
      desired.externalEndpoint,
      probe.status,
      probe.reason
    )
  }

  checkpoint('apply', signal)
  const applied = await inGroup(
    `Applying cluster objects in namespace '${desired.namespace}'`,
    () => deps.applier.apply(buildResourceObjects(desired))
  )

  checkpoint('credential', signal)
  const { credential, reused } = await inGroup(
    `Materializing credential for '${desired.namespace}/${desired.serviceAccount}'`,
    () =>
      deps.materializer.materialize(
        desired.serviceAccount,
        desired.namespace,
        desired.credentialTTL,
        credentialOptions(desired, applied)
      )
  )
  if (credential.expiresAt.getTime() <= now().getTime()) {
    throw new CredentialUnavailableError(
      `Credential for '${desired.namespace}/${desired.serviceAccount}' expired at ${credential.expiresAt.toISOString()}`
    )
  }

  checkpoint('render', signal)
  const document = await inGroup(
    'Rendering controller configuration',
    async () => {
      assertReferencesApplied(desired, applied)
      const rendered = render(desired, credential)
      core.info(`✅ Configuration rendered for cloud '${desired.cloudName}'`)
      return rendered
    }
  )

  checkpoint('activate', signal)
  const activation = await inGroup('Activating controller configuration', () =>
    deps.activator.activate(document)
  )

  return {
    serverVersion: probe.serverVersion,
    applied,
    credential: {
      subject: credential.subject,
      expiresAt: credential.expiresAt,
      reused
    },
    configPath: desired.configPath,
    activation
  }
}
