export { KubernetesClient } from './kubernetes-client'
export {
  loadKubeConfig,
  describeCurrentCluster,
  probeCluster
} from './kubernetes-access'
export type { LoadKubeConfigOptions, ProbeOptions } from './kubernetes-access'
export { Labels } from './labels'
export { API_VERSIONS, CLUSTER_SCOPED_KINDS, PROBE_TIMEOUT_MS } from './constants'
export type {
  ResourceKind,
  ResourceRef,
  ManifestObject,
  IssuedToken,
  ProbeResult,
  ClusterEndpoint
} from './types'
