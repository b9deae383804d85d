import type { ResourceRef } from '@kube-agent-cloud/k8s-client'
import type { AppliedObject } from './types'

export type Stage =
  | 'configuration'
  | 'probe'
  | 'apply'
  | 'credential'
  | 'render'
  | 'activate'

/**
 * Process exit codes, one per failing stage
 */
export enum ExitCode {
  Success = 0,
  InvalidConfiguration = 1,
  PreconditionFailed = 2,
  ApplyFailed = 3,
  CredentialUnavailable = 4,
  RenderInvalid = 5,
  ActivationTimeout = 6,
  ActivationRejected = 7,
  Cancelled = 130
}

export abstract class ReconcileError extends Error {
  abstract readonly stage: Stage
  abstract readonly exitCode: ExitCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConfigurationError extends ReconcileError {
  readonly stage = 'configuration'
  readonly exitCode = ExitCode.InvalidConfiguration
}

export class PreconditionFailedError extends ReconcileError {
  readonly stage = 'probe'
  readonly exitCode = ExitCode.PreconditionFailed

  constructor(
    readonly endpoint: string,
    readonly reason: 'unreachable' | 'unauthorized',
    detail: string
  ) {
    super(`Cluster at ${endpoint} is ${reason}: ${detail}`)
  }
}

export type ApplyFailureKind =
  | 'transient'
  | 'permission-denied'
  | 'rejected'
  | 'not-ready'

export class ApplyFailedError extends ReconcileError {
  readonly stage = 'apply'
  readonly exitCode = ExitCode.ApplyFailed

  constructor(
    readonly applied: AppliedObject[],
    readonly failedAt: ResourceRef,
    readonly failure: ApplyFailureKind,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Failed to apply ${failedAt.kind} '${failedAt.name}' (${failure}): ${detail}`,
      options
    )
  }

  /**
   * Whether re-running may succeed without operator action
   */
  get retryable(): boolean {
    return this.failure === 'transient' || this.failure === 'not-ready'
  }
}

export class CredentialUnavailableError extends ReconcileError {
  readonly stage = 'credential'
  readonly exitCode = ExitCode.CredentialUnavailable
}

export class RenderInvalidError extends ReconcileError {
  readonly stage = 'render'
  readonly exitCode = ExitCode.RenderInvalid

  constructor(
    readonly field: string,
    detail: string
  ) {
    super(`Invalid ${field}: ${detail}`)
  }
}

export class ActivationTimeoutError extends ReconcileError {
  readonly stage = 'activate'
  readonly exitCode = ExitCode.ActivationTimeout
}

export class ActivationRejectedError extends ReconcileError {
  readonly stage = 'activate'
  readonly exitCode = ExitCode.ActivationRejected

  constructor(
    readonly status: number,
    readonly detail: string
  ) {
    super(`Controller rejected the configuration (HTTP ${status}): ${detail}`)
  }
}

export class RunCancelledError extends ReconcileError {
  readonly stage: Stage
  readonly exitCode = ExitCode.Cancelled

  constructor(stage: Stage, message?: string) {
    super(message ?? `Run cancelled before the ${stage} stage`)
    this.stage = stage
  }
}
