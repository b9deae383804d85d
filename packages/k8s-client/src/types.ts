import type * as k8s from '@kubernetes/client-node'

/**
 * Kinds managed by the reconciler, in no particular order
 */
export type ResourceKind =
  | 'Namespace'
  | 'ServiceAccount'
  | 'ClusterRole'
  | 'ClusterRoleBinding'
  | 'PodTemplate'

/**
 * Identity of an object in the cluster
 */
export interface ResourceRef {
  kind: ResourceKind
  name: string
  namespace?: string
}

/**
 * A complete manifest as sent to the API server
 */
export interface ManifestObject extends k8s.KubernetesObject {
  apiVersion: string
  kind: ResourceKind
  metadata: {
    name: string
    namespace?: string
    labels?: Record<string, string>
  }
  [field: string]: unknown
}

/**
 * Token issued through the TokenRequest API
 */
export interface IssuedToken {
  token: string
  expirationTimestamp: Date
}

/**
 * Outcome of the read-only connectivity probe
 */
export type ProbeResult =
  | { status: 'ready'; serverVersion: string; username?: string }
  | { status: 'unreachable'; reason: string }
  | { status: 'unauthorized'; reason: string }

/**
 * Endpoint and CA of the kubeconfig's current cluster
 */
export interface ClusterEndpoint {
  server: string
  certificateAuthority?: string
  skipTLSVerify: boolean
}
