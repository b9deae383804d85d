import { DEFAULT_POD_TEMPLATE } from '../src/inputs'
import { Credential, DesiredState } from '../src/types'

export const NOW = new Date('2026-10-19T00:00:00.000Z')

export const HOUR_MS = 60 * 60 * 1000

export const DAY_MS = 24 * HOUR_MS

export function desiredState(overrides: Partial<DesiredState> = {}): DesiredState {
  const state: DesiredState = {
    externalEndpoint: 'https://10.0.0.1:6443',
    namespace: 'jenkins',
    roleName: 'jenkins',
    bindingName: 'jenkins',
    serviceAccount: 'jenkins',
    credentialTTL: 8760 * HOUR_MS,
    credentialTTLText: '8760h',
    controllerURL: 'http://jenkins.test:8080',
    tunnelAddress: 'jenkins-agent.ci.svc:50000',
    podTemplate: Object.freeze({ ...DEFAULT_POD_TEMPLATE }),
    cloudName: 'kubernetes',
    credentialId: 'k8s-service-account-token',
    clusterCertificate: 'test-ca-certificate',
    containerCap: 10,
    credentialPolicy: 'reuse',
    stateDir: '.kube-agent-cloud',
    configPath: '/var/lib/jenkins/casc_configs/jenkins.yaml',
    activationTimeout: 5 * 60 * 1000,
    requestTimeout: 30 * 1000,
    smokeTestJob: true,
    systemMessage: 'Test controller',
    ...overrides
  }
  return Object.freeze(state)
}

export function credential(overrides: Partial<Credential> = {}): Credential {
  return {
    value: 'test-secret-token',
    issuedAt: NOW,
    expiresAt: new Date(NOW.getTime() + 8760 * HOUR_MS),
    subject: { namespace: 'jenkins', serviceAccount: 'jenkins' },
    ...overrides
  }
}
