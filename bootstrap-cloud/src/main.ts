import * as core from '@actions/core'
import type * as k8s from '@kubernetes/client-node'
import {
  KubernetesClient,
  describeCurrentCluster,
  loadKubeConfig,
  probeCluster
} from '@kube-agent-cloud/k8s-client'
import { ANSI_RED, ANSI_RESET } from '@kube-agent-cloud/shared/constants'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { ControllerActivator } from './activator'
import { ResourceApplier, clusterStore } from './applier'
import { FileCredentialStore } from './credential-store'
import { CredentialMaterializer } from './credentials'
import {
  ApplyFailedError,
  ConfigurationError,
  ExitCode,
  ReconcileError
} from './errors'
import {
  ActionInputs,
  getActionInputs,
  readConfigFile,
  resolveDesiredState
} from './inputs'
import { reconcile } from './pipeline'
import { formatAppliedObjects, generateRunSummary } from './summary'

function reportFailure(error: unknown): ExitCode {
  if (error instanceof ApplyFailedError) {
    core.info('Objects applied before the failure:')
    const lines = formatAppliedObjects(error.applied)
    if (lines.length === 0) {
      core.info('  (none)')
    }
    lines.forEach((line) => core.info(`  ${line}`))
    core.info(
      error.retryable
        ? 'The failure looks transient; re-running resumes from the failed object.'
        : 'Fix the reported problem, then re-run; converged objects are left as they are.'
    )
  }

  if (error instanceof ReconcileError) {
    core.setFailed(
      `${ANSI_RED}ERROR ❌ [${error.stage}] ${error.message}${ANSI_RESET}`
    )
    return error.exitCode
  }

  core.setFailed(
    error instanceof Error ? error.message : 'An unexpected error occurred'
  )
  return ExitCode.InvalidConfiguration
}

function loadClusterConfig(inputs: ActionInputs): k8s.KubeConfig {
  try {
    return loadKubeConfig({
      kubeconfigPath: inputs.kubeconfig || undefined,
      context: inputs.kubeContext || undefined
    })
  } catch (error: unknown) {
    throw new ConfigurationError(errorMessage(error), { cause: error })
  }
}

export async function run(): Promise<void> {
  const controller = new AbortController()
  const cancel = (signal: NodeJS.Signals): void => {
    core.warning(`Received ${signal}, stopping before the next stage`)
    controller.abort()
  }
  process.once('SIGINT', cancel)
  process.once('SIGTERM', cancel)

  try {
    const inputs = getActionInputs()

    const kc = loadClusterConfig(inputs)

    const desired = resolveDesiredState(
      inputs.configFile ? readConfigFile(inputs.configFile) : {},
      inputs,
      describeCurrentCluster(kc)
    )
    core.info(`K8s API server: ${desired.externalEndpoint}`)
    core.info(`Controller URL: ${desired.controllerURL}`)
    core.info(`Credential policy: ${desired.credentialPolicy}`)

    const client = new KubernetesClient(kc)
    const report = await reconcile(
      desired,
      {
        probe: () => probeCluster(kc, { timeoutMs: desired.requestTimeout }),
        applier: new ResourceApplier(clusterStore(client), {
          requestTimeoutMs: desired.requestTimeout
        }),
        materializer: new CredentialMaterializer({
          policy: desired.credentialPolicy,
          issuer: client,
          store: new FileCredentialStore(desired.stateDir),
          lockDir: desired.stateDir,
          requestTimeoutMs: desired.requestTimeout
        }),
        activator: new ControllerActivator({
          configPath: desired.configPath,
          controllerURL: desired.controllerURL,
          reloadToken: desired.reloadToken,
          configOwner: desired.configOwner,
          maxWaitMs: desired.activationTimeout,
          requestTimeoutMs: desired.requestTimeout,
          signal: controller.signal
        })
      },
      controller.signal
    )

    core.setOutput('config-path', report.configPath)
    core.setOutput(
      'credential-expires-at',
      report.credential.expiresAt.toISOString()
    )
    core.setOutput('applied-objects', JSON.stringify(report.applied.objects))
    core.setOutput('activation', report.activation.outcome)

    await generateRunSummary(report)

    core.info('✅ Controller configured with the Kubernetes cloud')
  } catch (error: unknown) {
    process.exitCode = reportFailure(error)
  } finally {
    process.off('SIGINT', cancel)
    process.off('SIGTERM', cancel)
  }
}
