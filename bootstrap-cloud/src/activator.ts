import * as core from '@actions/core'
import * as fs from 'fs'
import * as path from 'path'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { excerpt } from '@kube-agent-cloud/shared/string-utils'
import {
  backoffDelay,
  formatDuration,
  sleep
} from '@kube-agent-cloud/shared/time-utils'
import {
  ActivationRejectedError,
  ActivationTimeoutError,
  RunCancelledError
} from './errors'
import { serializeDocument } from './renderer'
import {
  ActivationObservation,
  ActivationOutcome,
  ActivationResult,
  ControllerConfigDocument,
  FileOwner
} from './types'

// Liveness retry configuration
const INITIAL_RETRY_DELAY_MS = 1000
const MAX_RETRY_DELAY_MS = 10000

export interface ActivatorOptions {
  configPath: string
  controllerURL: string
  reloadToken?: string
  /**
   * Owner given to the written file, for a controller running as its own user
   */
  configOwner?: FileOwner
  maxWaitMs?: number
  requestTimeoutMs?: number
  fetch?: typeof fetch
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  signal?: AbortSignal
}

/**
 * Installs the configuration document and waits until the controller serves
 * requests with it.
 */
export class ControllerActivator {
  private readonly configPath: string
  private readonly baseURL: string
  private readonly reloadToken?: string
  private readonly configOwner?: FileOwner
  private readonly maxWaitMs: number
  private readonly requestTimeoutMs: number
  private readonly fetch: typeof fetch
  private readonly sleep: (ms: number) => Promise<void>
  private readonly now: () => number
  private readonly signal?: AbortSignal

  constructor(options: ActivatorOptions) {
    this.configPath = options.configPath
    this.baseURL = options.controllerURL.replace(/\/+$/, '')
    this.reloadToken = options.reloadToken
    this.configOwner = options.configOwner
    this.maxWaitMs = options.maxWaitMs ?? 300000
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10000
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init))
    this.sleep = options.sleep ?? sleep
    this.now = options.now ?? Date.now
    this.signal = options.signal
  }

  /**
   * A controller that is already up when a changed file is written keeps its
   * old configuration until it reloads. Without a reload token that is
   * reported as `pending-restart` rather than live.
   */
  async activate(document: ControllerConfigDocument): Promise<ActivationResult> {
    if (this.signal?.aborted) {
      throw new RunCancelledError('activate')
    }

    const content = serializeDocument(document)
    const changed = (await this.readCurrent()) !== content

    if (changed && !this.reloadToken) {
      const before = await this.observe()
      if (before.state !== 'down') {
        await this.writeContent(content)
        core.warning(
          `Controller at ${this.baseURL} is already running (HTTP ${before.status}) and no reload token is set; the new configuration takes effect when it restarts`
        )
        return {
          outcome: 'pending-restart',
          status: before.status,
          attempts: 1,
          elapsedMs: 0
        }
      }
    }

    await this.writeContent(content)

    let outcome: ActivationOutcome = changed ? 'started' : 'unchanged'
    if (this.reloadToken) {
      await this.waitForLive()
      await this.reload(this.reloadToken)
      outcome = 'reloaded'
    }

    const live = await this.waitForLive()
    core.info(
      `✅ Controller is live at ${this.baseURL} (HTTP ${live.status}, ${live.attempts} attempt(s), configuration ${outcome})`
    )
    return { outcome, ...live }
  }

  private async readCurrent(): Promise<string | undefined> {
    try {
      return await fs.promises.readFile(this.configPath, 'utf8')
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined
      }
      throw error
    }
  }

  /**
   * Replace the configuration file atomically. The file holds the token, so it
   * is readable by its owner only.
   */
  private async writeContent(content: string): Promise<void> {
    core.info(`Writing controller configuration to ${this.configPath}`)

    await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true })
    const temporary = `${this.configPath}.${process.pid}.tmp`
    try {
      await fs.promises.writeFile(temporary, content, {
        encoding: 'utf8',
        mode: 0o600
      })
      if (this.configOwner) {
        await fs.promises.chown(
          temporary,
          this.configOwner.uid,
          this.configOwner.gid
        )
      }
      await fs.promises.rename(temporary, this.configPath)
    } catch (error: unknown) {
      await fs.promises.rm(temporary, { force: true })
      throw new Error(
        `Failed to write ${this.configPath}: ${errorMessage(error)}`,
        { cause: error }
      )
    }
  }

  private requestSignal(): AbortSignal {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs)
    return this.signal ? AbortSignal.any([timeout, this.signal]) : timeout
  }

  /**
   * One liveness probe. 503 and connection errors mean the controller is still
   * starting; other unexpected statuses mean it is up but unhealthy.
   */
  async observe(): Promise<ActivationObservation> {
    let response: Response
    try {
      response = await this.fetch(`${this.baseURL}/login`, {
        method: 'GET',
        redirect: 'manual',
        signal: this.requestSignal()
      })
    } catch (error: unknown) {
      return { state: 'down', reason: errorMessage(error) }
    }

    if (
      (response.status >= 200 && response.status < 400) ||
      response.status === 403
    ) {
      return { state: 'live', status: response.status }
    }
    if (response.status === 503) {
      return { state: 'down', reason: 'HTTP 503 Service Unavailable' }
    }

    const body = await response.text().catch(() => '')
    return {
      state: 'rejected',
      status: response.status,
      detail: excerpt(body || response.statusText)
    }
  }

  /**
   * Poll with exponential backoff until live, rejected, or out of time
   */
  async waitForLive(): Promise<Omit<ActivationResult, 'outcome'>> {
    const startTime = this.now()
    let attempts = 0
    let lastReason = 'no response'

    core.info(
      `Waiting up to ${formatDuration(this.maxWaitMs)} for the controller at ${this.baseURL}...`
    )

    for (;;) {
      if (this.signal?.aborted) {
        throw new RunCancelledError(
          'activate',
          `Run cancelled while waiting for the controller at ${this.baseURL} (last: ${lastReason})`
        )
      }

      attempts++
      const observation = await this.observe()

      if (observation.state === 'live') {
        return {
          status: observation.status,
          attempts,
          elapsedMs: this.now() - startTime
        }
      }
      if (observation.state === 'rejected') {
        throw new ActivationRejectedError(
          observation.status,
          observation.detail
        )
      }

      lastReason = observation.reason
      const remaining = this.maxWaitMs - (this.now() - startTime)
      if (remaining <= 0) {
        break
      }

      const delay = Math.min(
        backoffDelay(attempts, INITIAL_RETRY_DELAY_MS, MAX_RETRY_DELAY_MS),
        remaining
      )
      core.info(
        `Controller not up yet (${lastReason}), retrying in ${delay}ms (attempt ${attempts})...`
      )
      await this.sleep(delay)
    }

    throw new ActivationTimeoutError(
      `Controller at ${this.baseURL} did not become live within ${formatDuration(this.maxWaitMs)} after ${attempts} attempts (last: ${lastReason})`
    )
  }

  /**
   * Ask a running controller to load the new file
   */
  async reload(token: string): Promise<void> {
    core.info('Requesting configuration reload')

    let response: Response
    try {
      response = await this.fetch(
        `${this.baseURL}/reload-configuration-as-code/?casc-reload-token=${encodeURIComponent(token)}`,
        { method: 'POST', redirect: 'manual', signal: this.requestSignal() }
      )
    } catch (error: unknown) {
      throw new ActivationTimeoutError(
        `Reload request to ${this.baseURL} failed: ${errorMessage(error)}`
      )
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '')
      throw new ActivationRejectedError(
        response.status,
        excerpt(body || response.statusText)
      )
    }
    core.info('✅ Configuration reload accepted')
  }
}
