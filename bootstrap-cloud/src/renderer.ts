import YAML from 'yaml'
import { RenderInvalidError } from './errors'
import {
  AdminAccount,
  CloudPodTemplate,
  ControllerConfigDocument,
  Credential,
  DesiredState,
  KubernetesCloud,
  LocalSecurityRealm
} from './types'

export const CREDENTIAL_DESCRIPTION = 'Kubernetes Service Account Token'

export const SMOKE_TEST_JOB = 'test-k8s-agent'

const LABEL_PATTERN = /^[A-Za-z0-9_.-]+( [A-Za-z0-9_.-]+)*$/
const HOST_PORT_PATTERN =
  /^(\[[0-9A-Fa-f:.]+\]|[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?):(\d{1,5})$/

export interface HostPort {
  host: string
  port: number
}

export function parseHostPort(field: string, address: string): HostPort {
  const match = HOST_PORT_PATTERN.exec(address)
  if (!match) {
    throw new RenderInvalidError(
      field,
      `'${address}' is not a host:port address`
    )
  }

  const port = parseInt(match[2], 10)
  if (port < 1 || port > 65535) {
    throw new RenderInvalidError(field, `port ${port} is out of range`)
  }

  return { host: match[1], port }
}

export function parseHttpURL(field: string, value: string): URL {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new RenderInvalidError(field, `'${value}' is not a valid URL`)
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RenderInvalidError(
      field,
      `'${value}' must use http or https, not ${url.protocol}`
    )
  }
  if (!url.hostname) {
    throw new RenderInvalidError(field, `'${value}' has no host`)
  }
  return url
}

/**
 * Keep `${...}` in a value literal; the controller would otherwise substitute it
 */
export function escapeVariables(value: string): string {
  return value.replace(/\$\{/g, '^${')
}

function smokeTestScript(label: string): string {
  return [
    `pipelineJob('${SMOKE_TEST_JOB}') {`,
    `  description('Test pipeline to verify Kubernetes agents are working')`,
    `  definition {`,
    `    cps {`,
    `      script('''`,
    `        pipeline {`,
    `          agent { label '${label}' }`,
    `          stages {`,
    `            stage('Hello') {`,
    `              steps {`,
    `                echo 'Hello from Kubernetes Agent!'`,
    `                sh 'hostname'`,
    `                sh 'cat /etc/os-release'`,
    `              }`,
    `            }`,
    `            stage('Environment') {`,
    `              steps {`,
    `                sh 'env | sort'`,
    `              }`,
    `            }`,
    `          }`,
    `        }`,
    `      '''.stripIndent())`,
    `      sandbox(true)`,
    `    }`,
    `  }`,
    `}`
  ].join('\n')
}

function podTemplateFor(desired: DesiredState): CloudPodTemplate {
  const template = desired.podTemplate
  return {
    name: template.name,
    namespace: desired.namespace,
    label: template.label,
    nodeUsageMode: 'NORMAL',
    serviceAccount: desired.serviceAccount,
    idleMinutes: template.idleMinutes,
    containers: [
      {
        name: 'jnlp',
        image: template.image,
        workingDir: template.workingDir,
        ttyEnabled: true,
        resourceRequestCpu: template.cpuRequest,
        resourceRequestMemory: template.memoryRequest,
        resourceLimitCpu: template.cpuLimit,
        resourceLimitMemory: template.memoryLimit
      }
    ],
    yamlMergeStrategy: 'override',
    podRetention: 'never'
  }
}

function securityRealmFor(admin: AdminAccount): LocalSecurityRealm {
  return {
    local: {
      allowsSignup: false,
      users: [
        {
          id: escapeVariables(admin.id),
          password: escapeVariables(admin.password)
        }
      ]
    }
  }
}

/**
 * Build the controller configuration from the desired state and the issued
 * credential. Pure: no I/O, no clock.
 */
export function render(
  desired: DesiredState,
  credential: Credential
): ControllerConfigDocument {
  parseHttpURL('controllerURL', desired.controllerURL)
  parseHttpURL('externalEndpoint', desired.externalEndpoint)
  const tunnel = parseHostPort('tunnelAddress', desired.tunnelAddress)

  if (!LABEL_PATTERN.test(desired.podTemplate.label)) {
    throw new RenderInvalidError(
      'podTemplate.label',
      `'${desired.podTemplate.label}' must be space-separated words of letters, digits, '.', '_' or '-'`
    )
  }
  if (
    credential.subject.namespace !== desired.namespace ||
    credential.subject.serviceAccount !== desired.serviceAccount
  ) {
    throw new RenderInvalidError(
      'credential',
      `issued for '${credential.subject.namespace}/${credential.subject.serviceAccount}', expected '${desired.namespace}/${desired.serviceAccount}'`
    )
  }
  if (!credential.value) {
    throw new RenderInvalidError('credential', 'token is empty')
  }
  if (desired.admin && (!desired.admin.id || !desired.admin.password)) {
    throw new RenderInvalidError('admin', 'id and password must both be set')
  }

  const cloud: KubernetesCloud = {
    name: desired.cloudName,
    serverUrl: desired.externalEndpoint,
    skipTlsVerify: desired.clusterCertificate === undefined,
    namespace: desired.namespace,
    jenkinsUrl: desired.controllerURL,
    jenkinsTunnel: desired.tunnelAddress,
    credentialsId: desired.credentialId,
    containerCapStr: String(desired.containerCap),
    maxRequestsPerHostStr: '32',
    retentionTimeout: 5,
    connectTimeout: 5,
    readTimeout: 15,
    templates: [podTemplateFor(desired)]
  }
  if (desired.clusterCertificate !== undefined) {
    cloud.serverCertificate = desired.clusterCertificate
  }

  const document: ControllerConfigDocument = {
    jenkins: {
      systemMessage: escapeVariables(desired.systemMessage),
      numExecutors: 0,
      mode: 'EXCLUSIVE',
      slaveAgentPort: tunnel.port,
      clouds: [{ kubernetes: cloud }]
    },
    credentials: {
      system: {
        domainCredentials: [
          {
            credentials: [
              {
                string: {
                  scope: 'GLOBAL',
                  id: desired.credentialId,
                  description: CREDENTIAL_DESCRIPTION,
                  secret: escapeVariables(credential.value)
                }
              }
            ]
          }
        ]
      }
    },
    unclassified: {
      location: {
        url: desired.controllerURL
      }
    }
  }

  if (desired.admin) {
    document.jenkins.securityRealm = securityRealmFor(desired.admin)
    document.jenkins.authorizationStrategy = {
      loggedInUsersCanDoAnything: { allowAnonymousRead: false }
    }
  }
  if (desired.adminAddress !== undefined) {
    document.unclassified.location.adminAddress = escapeVariables(
      desired.adminAddress
    )
  }

  if (desired.smokeTestJob) {
    const label = desired.podTemplate.label.split(' ')[0]
    document.jobs = [{ script: smokeTestScript(label) }]
  }

  return document
}

/**
 * Serialize to YAML. Strings are quoted where YAML would otherwise reinterpret them.
 */
export function serializeDocument(document: ControllerConfigDocument): string {
  const doc = new YAML.Document(document)
  doc.commentBefore =
    ' Generated by kube-agent-cloud. Replaced on every run; do not edit.'
  return doc.toString({ lineWidth: 0 })
}

export function parseDocument(text: string): unknown {
  return YAML.parse(text)
}
