import type {
  ManifestObject,
  ResourceKind,
  ResourceRef
} from '@kube-agent-cloud/k8s-client'

export type CredentialPolicy = 'reuse' | 'reissue'

/**
 * Agent pod template shared by the cluster PodTemplate and the controller cloud
 */
export interface PodTemplateSpec {
  readonly name: string
  readonly label: string
  readonly image: string
  readonly workingDir: string
  readonly cpuRequest: string
  readonly memoryRequest: string
  readonly cpuLimit: string
  readonly memoryLimit: string
  readonly idleMinutes: number
}

export interface AdminAccount {
  readonly id: string
  readonly password: string
}

export interface FileOwner {
  readonly uid: number
  readonly gid: number
}

/**
 * Target configuration for one run. Frozen once loaded.
 */
export interface DesiredState {
  readonly externalEndpoint: string
  readonly namespace: string
  readonly roleName: string
  readonly bindingName: string
  readonly serviceAccount: string
  readonly credentialTTL: number
  readonly credentialTTLText: string
  readonly controllerURL: string
  readonly tunnelAddress: string
  readonly podTemplate: PodTemplateSpec
  readonly cloudName: string
  readonly credentialId: string
  readonly clusterCertificate?: string
  readonly containerCap: number
  readonly credentialPolicy: CredentialPolicy
  readonly stateDir: string
  readonly configPath: string
  readonly reloadToken?: string
  readonly activationTimeout: number
  readonly requestTimeout: number
  readonly smokeTestJob: boolean
  readonly systemMessage: string
  readonly admin?: AdminAccount
  readonly adminAddress?: string
  readonly configOwner?: FileOwner
}

/**
 * A desired cluster object. Identity is (kind, name).
 */
export interface ResourceObject {
  kind: ResourceKind
  name: string
  namespace?: string
  manifest: ManifestObject
}

export type ApplyOutcome = 'created' | 'updated' | 'unchanged'

export interface AppliedObject {
  ref: ResourceRef
  outcome: ApplyOutcome
}

export interface AppliedSet {
  objects: AppliedObject[]
}

export interface CredentialSubject {
  namespace: string
  serviceAccount: string
}

export interface Credential {
  value: string
  issuedAt: Date
  expiresAt: Date
  subject: CredentialSubject
  /**
   * API server the token was issued by
   */
  cluster?: string
}

export interface MaterializedCredential {
  credential: Credential
  reused: boolean
}

export interface ContainerTemplate {
  name: string
  image: string
  workingDir: string
  ttyEnabled: boolean
  resourceRequestCpu: string
  resourceRequestMemory: string
  resourceLimitCpu: string
  resourceLimitMemory: string
}

export interface CloudPodTemplate {
  name: string
  namespace: string
  label: string
  nodeUsageMode: 'NORMAL' | 'EXCLUSIVE'
  serviceAccount: string
  idleMinutes: number
  containers: ContainerTemplate[]
  yamlMergeStrategy: 'override'
  podRetention: 'never'
}

export interface KubernetesCloud {
  name: string
  serverUrl: string
  skipTlsVerify: boolean
  serverCertificate?: string
  namespace: string
  jenkinsUrl: string
  jenkinsTunnel: string
  credentialsId: string
  containerCapStr: string
  maxRequestsPerHostStr: string
  retentionTimeout: number
  connectTimeout: number
  readTimeout: number
  templates: CloudPodTemplate[]
}

export interface LocalSecurityRealm {
  local: {
    allowsSignup: boolean
    users: Array<{ id: string; password: string }>
  }
}

export interface LoggedInAuthorizationStrategy {
  loggedInUsersCanDoAnything: {
    allowAnonymousRead: boolean
  }
}

export interface StringCredential {
  string: {
    scope: 'GLOBAL'
    id: string
    description: string
    secret: string
  }
}

/**
 * Configuration-as-Code document consumed by the controller
 */
export interface ControllerConfigDocument {
  jenkins: {
    systemMessage: string
    numExecutors: number
    mode: 'NORMAL' | 'EXCLUSIVE'
    securityRealm?: LocalSecurityRealm
    authorizationStrategy?: LoggedInAuthorizationStrategy
    slaveAgentPort: number
    clouds: Array<{ kubernetes: KubernetesCloud }>
  }
  credentials: {
    system: {
      domainCredentials: Array<{ credentials: StringCredential[] }>
    }
  }
  unclassified: {
    location: {
      url: string
      adminAddress?: string
    }
  }
  jobs?: Array<{ script: string }>
}

export type ActivationObservation =
  | { state: 'down'; reason: string }
  | { state: 'live'; status: number }
  | { state: 'rejected'; status: number; detail: string }

/**
 * How the written configuration reached the controller:
 * `started` the controller came up after the write, `reloaded` it was asked to
 * reload, `unchanged` the file already held this document, `pending-restart`
 * it was already running and reads the file on its next start.
 */
export type ActivationOutcome =
  | 'started'
  | 'reloaded'
  | 'unchanged'
  | 'pending-restart'

export interface ActivationResult {
  outcome: ActivationOutcome
  status: number
  attempts: number
  elapsedMs: number
}

/**
 * Everything a finished run reports
 */
export interface RunReport {
  serverVersion: string
  applied: AppliedSet
  credential: {
    subject: CredentialSubject
    expiresAt: Date
    reused: boolean
  }
  configPath: string
  activation: ActivationResult
}
