import * as core from '@actions/core'
import * as fs from 'fs'
import YAML from 'yaml'
import type { ClusterEndpoint } from '@kube-agent-cloud/k8s-client'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { isValidResourceName } from '@kube-agent-cloud/shared/string-utils'
import { parseDuration } from '@kube-agent-cloud/shared/time-utils'
import { ConfigurationError } from './errors'
import {
  AdminAccount,
  CredentialPolicy,
  DesiredState,
  FileOwner,
  PodTemplateSpec
} from './types'

/**
 * Values given directly to the action; each overrides the config file
 */
export interface ActionInputs {
  configFile: string
  kubeconfig: string
  kubeContext: string
  externalEndpoint: string
  namespace: string
  roleName: string
  bindingName: string
  serviceAccount: string
  credentialTTL: string
  controllerURL: string
  tunnelAddress: string
  credentialPolicy: string
  stateDir: string
  configPath: string
  reloadToken: string
  activationTimeout: string
  requestTimeout: string
  adminUser: string
  adminPassword: string
  configOwner: string
}

type ConfigValues = Record<string, unknown>

export const DEFAULT_POD_TEMPLATE: PodTemplateSpec = {
  name: 'jnlp-agent',
  label: 'kubernetes jnlp',
  image: 'jenkins/inbound-agent:latest',
  workingDir: '/home/jenkins/agent',
  cpuRequest: '200m',
  memoryRequest: '256Mi',
  cpuLimit: '500m',
  memoryLimit: '512Mi',
  idleMinutes: 0
}

const CREDENTIAL_POLICIES: readonly CredentialPolicy[] = ['reuse', 'reissue']

export function getActionInputs(env: NodeJS.ProcessEnv = process.env): ActionInputs {
  const reloadToken = core.getInput('reload-token')
  if (reloadToken) {
    core.setSecret(reloadToken)
  }
  const adminPassword =
    core.getInput('admin-password') || env.JENKINS_ADMIN_PASSWORD || ''
  if (adminPassword) {
    core.setSecret(adminPassword)
  }

  return {
    configFile: core.getInput('config-file'),
    kubeconfig: core.getInput('kubeconfig') || env.KUBECONFIG_PATH || '',
    kubeContext: core.getInput('kube-context'),
    externalEndpoint:
      core.getInput('external-endpoint') || env.K8S_API_SERVER || '',
    namespace: core.getInput('namespace'),
    roleName: core.getInput('role-name'),
    bindingName: core.getInput('binding-name'),
    serviceAccount: core.getInput('service-account'),
    credentialTTL: core.getInput('credential-ttl'),
    controllerURL: core.getInput('controller-url') || env.JENKINS_URL || '',
    tunnelAddress: core.getInput('tunnel-address') || env.JENKINS_TUNNEL || '',
    credentialPolicy: core.getInput('credential-policy'),
    stateDir: core.getInput('state-dir'),
    configPath: core.getInput('config-path'),
    reloadToken,
    activationTimeout: core.getInput('activation-timeout'),
    requestTimeout: core.getInput('request-timeout'),
    adminUser: core.getInput('admin-user') || env.JENKINS_ADMIN_USER || '',
    adminPassword,
    configOwner: core.getInput('config-owner')
  }
}

function isRecord(value: unknown): value is ConfigValues {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read a YAML (or JSON) desired-state document
 */
export function readConfigFile(file: string): ConfigValues {
  let parsed: unknown
  try {
    parsed = YAML.parse(fs.readFileSync(file, 'utf8'))
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Failed to read config file '${file}': ${errorMessage(error)}`,
      { cause: error }
    )
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      `Config file '${file}' must contain a mapping of desired-state fields`
    )
  }
  return parsed
}

function stringValue(
  values: ConfigValues,
  key: string,
  prefix = ''
): string | undefined {
  const value = values[key]
  if (value === undefined || value === null || value === '') {
    return undefined
  }
  if (typeof value === 'number') {
    return String(value)
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`'${prefix}${key}' must be a string`)
  }
  return value
}

function numberValue(
  values: ConfigValues,
  key: string,
  fallback: number,
  prefix = ''
): number {
  const value = values[key]
  if (value === undefined || value === null) {
    return fallback
  }
  const parsed = typeof value === 'string' ? Number(value) : value
  if (typeof parsed !== 'number' || !Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigurationError(
      `'${prefix}${key}' must be a non-negative integer`
    )
  }
  return parsed
}

function booleanValue(
  values: ConfigValues,
  key: string,
  fallback: boolean
): boolean {
  const value = values[key]
  if (value === undefined || value === null) {
    return fallback
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`'${key}' must be true or false`)
  }
  return value
}

function durationValue(key: string, text: string): number {
  try {
    return parseDuration(text)
  } catch (error: unknown) {
    throw new ConfigurationError(`'${key}': ${errorMessage(error)}`)
  }
}

function resourceName(key: string, value: string): string {
  if (!isValidResourceName(value)) {
    throw new ConfigurationError(
      `'${key}' must be a valid Kubernetes resource name, but got: ${value}`
    )
  }
  return value
}

function resolvePodTemplate(values: ConfigValues): PodTemplateSpec {
  const raw = values.podTemplate
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_POD_TEMPLATE }
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`'podTemplate' must be a mapping`)
  }

  const pick = (key: keyof PodTemplateSpec, fallback: string): string =>
    stringValue(raw, key, 'podTemplate.') ?? fallback

  return {
    name: resourceName(
      'podTemplate.name',
      pick('name', DEFAULT_POD_TEMPLATE.name)
    ),
    label: pick('label', DEFAULT_POD_TEMPLATE.label),
    image: pick('image', DEFAULT_POD_TEMPLATE.image),
    workingDir: pick('workingDir', DEFAULT_POD_TEMPLATE.workingDir),
    cpuRequest: pick('cpuRequest', DEFAULT_POD_TEMPLATE.cpuRequest),
    memoryRequest: pick('memoryRequest', DEFAULT_POD_TEMPLATE.memoryRequest),
    cpuLimit: pick('cpuLimit', DEFAULT_POD_TEMPLATE.cpuLimit),
    memoryLimit: pick('memoryLimit', DEFAULT_POD_TEMPLATE.memoryLimit),
    idleMinutes: numberValue(
      raw,
      'idleMinutes',
      DEFAULT_POD_TEMPLATE.idleMinutes,
      'podTemplate.'
    )
  }
}

const OWNER_PATTERN = /^(\d+):(\d+)$/

/**
 * Parse a numeric `uid:gid` pair
 */
export function parseFileOwner(text: string): FileOwner {
  const match = OWNER_PATTERN.exec(text)
  if (!match) {
    throw new ConfigurationError(
      `'configOwner' must be a numeric uid:gid pair, but got: ${text}`
    )
  }
  return { uid: parseInt(match[1], 10), gid: parseInt(match[2], 10) }
}

function resolveAdmin(
  values: ConfigValues,
  inputs: ActionInputs
): AdminAccount | undefined {
  const password =
    inputs.adminPassword || stringValue(values, 'adminPassword')
  const id = inputs.adminUser || stringValue(values, 'adminUser')
  if (!password) {
    if (id) {
      throw new ConfigurationError(`'adminPassword' is required with 'adminUser'`)
    }
    core.warning(
      'No admin account configured; the controller keeps its current security realm'
    )
    return undefined
  }
  core.setSecret(password)
  return Object.freeze({ id: id ?? 'admin', password })
}

/**
 * Merge action inputs over the config file over defaults, validate, and freeze.
 * The endpoint and CA fall back to the kubeconfig's current cluster.
 */
export function resolveDesiredState(
  values: ConfigValues,
  inputs: ActionInputs,
  cluster?: ClusterEndpoint
): DesiredState {
  const pick = (input: string, key: string): string | undefined =>
    input || stringValue(values, key)

  const externalEndpoint =
    pick(inputs.externalEndpoint, 'externalEndpoint') ?? cluster?.server
  if (!externalEndpoint) {
    throw new ConfigurationError(
      `'externalEndpoint' is required when the kubeconfig has no current cluster`
    )
  }
  if (!inputs.externalEndpoint && !stringValue(values, 'externalEndpoint')) {
    core.info(`Detected API server from kubeconfig: ${externalEndpoint}`)
  }

  const controllerURL = pick(inputs.controllerURL, 'controllerURL')
  if (!controllerURL) {
    throw new ConfigurationError(`'controllerURL' is required`)
  }
  const tunnelAddress = pick(inputs.tunnelAddress, 'tunnelAddress')
  if (!tunnelAddress) {
    throw new ConfigurationError(`'tunnelAddress' is required`)
  }

  const credentialTTLText = pick(inputs.credentialTTL, 'credentialTTL') ?? '8760h'
  const activationTimeoutText =
    pick(inputs.activationTimeout, 'activationTimeout') ?? '5m'
  const requestTimeoutText =
    pick(inputs.requestTimeout, 'requestTimeout') ?? '30s'
  const requestTimeout = durationValue('requestTimeout', requestTimeoutText)
  if (requestTimeout <= 0) {
    throw new ConfigurationError(`'requestTimeout' must be greater than zero`)
  }
  const configOwnerText = pick(inputs.configOwner, 'configOwner')

  const policyText = pick(inputs.credentialPolicy, 'credentialPolicy') ?? 'reuse'
  const credentialPolicy = CREDENTIAL_POLICIES.find((p) => p === policyText)
  if (!credentialPolicy) {
    throw new ConfigurationError(
      `'credentialPolicy' must be one of ${CREDENTIAL_POLICIES.join(', ')}, but got: ${policyText}`
    )
  }

  const clusterCertificate =
    stringValue(values, 'clusterCertificate') ??
    (cluster && !cluster.skipTLSVerify ? cluster.certificateAuthority : undefined)
  if (clusterCertificate === undefined) {
    core.warning(
      'No cluster CA certificate available; the controller will skip TLS verification'
    )
  }

  const podTemplate = Object.freeze(resolvePodTemplate(values))
  const reloadToken =
    inputs.reloadToken || stringValue(values, 'reloadToken') || undefined

  const desired: DesiredState = {
    externalEndpoint,
    namespace: resourceName(
      'namespace',
      pick(inputs.namespace, 'namespace') ?? 'jenkins'
    ),
    roleName: resourceName('roleName', pick(inputs.roleName, 'roleName') ?? 'jenkins'),
    bindingName: resourceName(
      'bindingName',
      pick(inputs.bindingName, 'bindingName') ?? 'jenkins'
    ),
    serviceAccount: resourceName(
      'serviceAccount',
      pick(inputs.serviceAccount, 'serviceAccount') ?? 'jenkins'
    ),
    credentialTTL: durationValue('credentialTTL', credentialTTLText),
    credentialTTLText,
    controllerURL,
    tunnelAddress,
    podTemplate,
    cloudName: stringValue(values, 'cloudName') ?? 'kubernetes',
    credentialId:
      stringValue(values, 'credentialId') ?? 'k8s-service-account-token',
    clusterCertificate,
    containerCap: numberValue(values, 'containerCap', 10),
    credentialPolicy,
    stateDir: pick(inputs.stateDir, 'stateDir') ?? '.kube-agent-cloud',
    configPath:
      pick(inputs.configPath, 'configPath') ??
      '/var/lib/jenkins/casc_configs/jenkins.yaml',
    reloadToken,
    activationTimeout: durationValue('activationTimeout', activationTimeoutText),
    requestTimeout,
    smokeTestJob: booleanValue(values, 'smokeTestJob', true),
    systemMessage:
      stringValue(values, 'systemMessage') ??
      'Jenkins configured automatically with Kubernetes Cloud - Ready to use!',
    admin: resolveAdmin(values, inputs),
    adminAddress: stringValue(values, 'adminAddress'),
    configOwner:
      configOwnerText === undefined
        ? undefined
        : Object.freeze(parseFileOwner(configOwnerText))
  }

  return Object.freeze(desired)
}
