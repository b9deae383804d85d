import * as core from '@actions/core'
import * as fs from 'fs'
import * as path from 'path'
import type { IssuedToken } from '@kube-agent-cloud/k8s-client'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { maskSecret, sanitizeName } from '@kube-agent-cloud/shared/string-utils'
import { formatDuration, withTimeout } from '@kube-agent-cloud/shared/time-utils'
import { CredentialStore } from './credential-store'
import { CredentialUnavailableError } from './errors'
import { KeyedLock, withFileLock } from './keyed-lock'
import {
  Credential,
  CredentialPolicy,
  CredentialSubject,
  MaterializedCredential
} from './types'

/**
 * Issues bounded service-account tokens
 */
export interface TokenIssuer {
  requestServiceAccountToken(
    serviceAccount: string,
    namespace: string,
    expirationSeconds: number
  ): Promise<IssuedToken>
}

export interface MaterializerOptions {
  policy: CredentialPolicy
  issuer: TokenIssuer
  store: CredentialStore
  lockDir: string
  /**
   * Reuse only while more than this fraction of the requested TTL remains
   */
  renewalFraction?: number
  /**
   * Bound on the TokenRequest call
   */
  requestTimeoutMs?: number
  now?: () => Date
}

export interface MaterializeOptions {
  /**
   * API server the token must be valid for; a stored token from another one
   * is not reused
   */
  cluster?: string
  /**
   * Skip the stored token, e.g. because the service account was just created
   */
  reissueReason?: string
}

// Minimum accepted by the TokenRequest API
export const MIN_TOKEN_TTL_MS = 10 * 60 * 1000

// Slack for the API server rounding the granted expiry
export const EXPIRY_TOLERANCE_MS = 60 * 1000

const processLocks = new KeyedLock()

export function subjectKey(subject: CredentialSubject): string {
  return `${subject.namespace}/${subject.serviceAccount}`
}

/**
 * Obtains a time-bounded credential for the controller's service account.
 *
 * With the `reuse` policy a stored token is handed back while enough of its
 * lifetime remains and it expires no later than a fresh one would, so
 * controllers already holding it keep working. With
 * `reissue` every run requests a new token. Both run under a lock keyed by
 * the subject, in-process and through a lock file in `lockDir`.
 */
export class CredentialMaterializer {
  private readonly policy: CredentialPolicy
  private readonly issuer: TokenIssuer
  private readonly store: CredentialStore
  private readonly lockDir: string
  private readonly renewalFraction: number
  private readonly requestTimeoutMs: number
  private readonly now: () => Date

  constructor(options: MaterializerOptions) {
    this.policy = options.policy
    this.issuer = options.issuer
    this.store = options.store
    this.lockDir = options.lockDir
    this.renewalFraction = options.renewalFraction ?? 0.1
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000
    this.now = options.now ?? (() => new Date())
  }

  async materialize(
    serviceAccount: string,
    namespace: string,
    ttlMs: number,
    options: MaterializeOptions = {}
  ): Promise<MaterializedCredential> {
    if (ttlMs < MIN_TOKEN_TTL_MS) {
      throw new CredentialUnavailableError(
        `Credential TTL ${formatDuration(ttlMs)} is below the minimum of ${formatDuration(MIN_TOKEN_TTL_MS)}`
      )
    }

    const subject: CredentialSubject = { namespace, serviceAccount }
    const lockPath = path.join(
      this.lockDir,
      `${sanitizeName(namespace)}.${sanitizeName(serviceAccount)}.lock`
    )

    return processLocks.run(subjectKey(subject), async () => {
      try {
        await fs.promises.mkdir(this.lockDir, { recursive: true, mode: 0o700 })
        return await withFileLock(lockPath, () =>
          this.materializeLocked(subject, ttlMs, options)
        )
      } catch (error: unknown) {
        if (error instanceof CredentialUnavailableError) {
          throw error
        }
        throw new CredentialUnavailableError(
          `Failed to materialize credential for service account '${subjectKey(subject)}': ${errorMessage(error)}`,
          { cause: error }
        )
      }
    })
  }

  /**
   * Why a stored credential cannot be handed back, or undefined when it can
   */
  private reuseBlocker(
    existing: Credential,
    ttlMs: number,
    options: MaterializeOptions
  ): string | undefined {
    const now = this.now().getTime()
    const remaining = existing.expiresAt.getTime() - now

    if (options.cluster !== undefined && existing.cluster !== options.cluster) {
      return `it was issued by ${existing.cluster ?? 'an unknown API server'}, not ${options.cluster}`
    }
    if (remaining <= ttlMs * this.renewalFraction) {
      return 'it is expired or close to expiry'
    }
    if (remaining > ttlMs + EXPIRY_TOLERANCE_MS) {
      return `it outlives the credential TTL of ${formatDuration(ttlMs)}`
    }
    return undefined
  }

  private async materializeLocked(
    subject: CredentialSubject,
    ttlMs: number,
    options: MaterializeOptions
  ): Promise<MaterializedCredential> {
    if (this.policy === 'reuse' && options.reissueReason) {
      core.info(
        `Not reusing stored token for '${subjectKey(subject)}': ${options.reissueReason}`
      )
    } else if (this.policy === 'reuse') {
      const existing = await this.store.load(subject)
      if (existing) {
        const blocker = this.reuseBlocker(existing, ttlMs, options)
        if (!blocker) {
          const remaining = existing.expiresAt.getTime() - this.now().getTime()
          core.setSecret(existing.value)
          core.info(
            `✅ Reusing token for '${subjectKey(subject)}' (expires ${existing.expiresAt.toISOString()}, ${formatDuration(remaining)} left)`
          )
          return { credential: existing, reused: true }
        }
        core.info(
          `Stored token for '${subjectKey(subject)}' is not reusable (${blocker}), reissuing`
        )
      }
    }

    const credential = await this.issue(subject, ttlMs, options.cluster)
    await this.store.save(credential)
    return { credential, reused: false }
  }

  private async issue(
    subject: CredentialSubject,
    ttlMs: number,
    cluster: string | undefined
  ): Promise<Credential> {
    const expirationSeconds = Math.ceil(ttlMs / 1000)
    core.info(
      `Requesting token for service account '${subjectKey(subject)}' (valid for ${formatDuration(ttlMs)})`
    )

    let issued: IssuedToken
    try {
      issued = await withTimeout(
        this.issuer.requestServiceAccountToken(
          subject.serviceAccount,
          subject.namespace,
          expirationSeconds
        ),
        this.requestTimeoutMs,
        'Timed out requesting token'
      )
    } catch (error: unknown) {
      throw new CredentialUnavailableError(
        `Cannot issue token for service account '${subjectKey(subject)}': ${errorMessage(error)}`,
        { cause: error }
      )
    }

    const issuedAt = this.now()
    if (isNaN(issued.expirationTimestamp.getTime())) {
      throw new CredentialUnavailableError(
        `Token for '${subjectKey(subject)}' has no valid expiration timestamp`
      )
    }
    if (issued.expirationTimestamp.getTime() <= issuedAt.getTime()) {
      throw new CredentialUnavailableError(
        `Token for '${subjectKey(subject)}' expired on issue (${issued.expirationTimestamp.toISOString()})`
      )
    }

    const requestedExpiry = issuedAt.getTime() + ttlMs
    if (
      Math.abs(issued.expirationTimestamp.getTime() - requestedExpiry) > 60000
    ) {
      core.info(
        `API server set expiry to ${issued.expirationTimestamp.toISOString()} (requested ${formatDuration(ttlMs)})`
      )
    }

    core.setSecret(issued.token)
    core.info(
      `✅ Token issued for '${subjectKey(subject)}': ${maskSecret(issued.token)}, expires ${issued.expirationTimestamp.toISOString()}`
    )

    const credential: Credential = {
      value: issued.token,
      issuedAt,
      expiresAt: issued.expirationTimestamp,
      subject
    }
    if (cluster !== undefined) {
      credential.cluster = cluster
    }
    return credential
  }
}
