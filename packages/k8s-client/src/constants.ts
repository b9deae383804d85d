import { ResourceKind } from './types'

/**
 * API group/version serving each managed kind
 */
export const API_VERSIONS: Record<ResourceKind, string> = {
  Namespace: 'v1',
  ServiceAccount: 'v1',
  ClusterRole: 'rbac.authorization.k8s.io/v1',
  ClusterRoleBinding: 'rbac.authorization.k8s.io/v1',
  PodTemplate: 'v1'
}

/**
 * Kinds that live outside any namespace
 */
export const CLUSTER_SCOPED_KINDS: ReadonlySet<ResourceKind> = new Set([
  'Namespace',
  'ClusterRole',
  'ClusterRoleBinding'
])

/**
 * Default bound on the connectivity probe
 */
export const PROBE_TIMEOUT_MS = 10000
