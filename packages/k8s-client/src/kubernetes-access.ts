import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import * as fs from 'fs'
import { errorMessage, statusCodeOf } from '@kube-agent-cloud/shared/errors'
import { withTimeout } from '@kube-agent-cloud/shared/time-utils'
import { KubernetesClient } from './kubernetes-client'
import { PROBE_TIMEOUT_MS } from './constants'
import { ClusterEndpoint, ProbeResult } from './types'

export interface LoadKubeConfigOptions {
  kubeconfigPath?: string
  context?: string
}

export interface ProbeOptions {
  timeoutMs?: number
}

const defaultProbeOptions: Required<ProbeOptions> = {
  timeoutMs: PROBE_TIMEOUT_MS
}

export function loadKubeConfig(
  options: LoadKubeConfigOptions = {}
): k8s.KubeConfig {
  const kc = new k8s.KubeConfig()

  if (options.kubeconfigPath) {
    if (!fs.existsSync(options.kubeconfigPath)) {
      throw new Error(
        `Kubeconfig not found at ${options.kubeconfigPath}. Copy it from the cluster's control plane (e.g. /etc/kubernetes/admin.conf)`
      )
    }
    kc.loadFromFile(options.kubeconfigPath)
  } else {
    kc.loadFromDefault()
  }

  if (options.context) {
    const contexts = kc.getContexts()
    if (!contexts.some((ctx) => ctx.name === options.context)) {
      core.error(
        `Cannot find context '${options.context}' in kubeconfig. Available contexts:`
      )
      contexts.forEach((ctx) => core.info(`  - ${ctx.name}`))
      throw new Error(`Context '${options.context}' does not exist`)
    }
    kc.setCurrentContext(options.context)
    core.info(`Using context: ${options.context}`)
  }

  return kc
}

/**
 * Server URL and CA certificate of the current cluster
 */
export function describeCurrentCluster(
  kc: k8s.KubeConfig
): ClusterEndpoint | undefined {
  const cluster = kc.getCurrentCluster()
  if (!cluster) {
    return undefined
  }

  let certificateAuthority: string | undefined
  if (cluster.caData) {
    certificateAuthority = Buffer.from(cluster.caData, 'base64').toString('utf8')
  } else if (cluster.caFile && fs.existsSync(cluster.caFile)) {
    certificateAuthority = fs.readFileSync(cluster.caFile, 'utf8')
  }

  return {
    server: cluster.server,
    certificateAuthority,
    skipTLSVerify: cluster.skipTLSVerify
  }
}

function classify(error: unknown, what: string): ProbeResult {
  const statusCode = statusCodeOf(error)
  const reason = `${what}: ${errorMessage(error)}`

  if (statusCode === 401 || statusCode === 403) {
    return { status: 'unauthorized', reason }
  }
  return { status: 'unreachable', reason }
}

/**
 * Read-only reachability and authentication check against the API server.
 * Never retries; the caller decides what to do with a failed probe.
 */
export async function probeCluster(
  kc: k8s.KubeConfig,
  options: ProbeOptions = {}
): Promise<ProbeResult> {
  const opts = { ...defaultProbeOptions, ...options }
  const client = new KubernetesClient(kc)

  let serverVersion: string
  try {
    serverVersion = await withTimeout(
      client.getServerVersion(),
      opts.timeoutMs,
      'Timed out reading server version'
    )
    core.info(`✅ API server reachable (version ${serverVersion})`)
  } catch (error: unknown) {
    return classify(error, 'Cannot read server version')
  }

  try {
    const username = await withTimeout(
      client.whoAmI(),
      opts.timeoutMs,
      'Timed out verifying credentials'
    )
    core.info(
      `✅ Successfully authenticated as: ${username || 'authenticated user'}`
    )
    return { status: 'ready', serverVersion, username }
  } catch (error: unknown) {
    // SelfSubjectReview is not served before Kubernetes 1.28
    if (client.isNotFoundError(error)) {
      core.warning(
        'SelfSubjectReview API not available; skipping identity check'
      )
      return { status: 'ready', serverVersion }
    }
    return classify(error, 'Cannot verify credentials')
  }
}
