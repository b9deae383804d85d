import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { FIELD_MANAGER } from '@kube-agent-cloud/shared/constants'
import { statusCodeOf } from '@kube-agent-cloud/shared/errors'
import { IssuedToken, ManifestObject, ResourceRef } from './types'
import { API_VERSIONS, CLUSTER_SCOPED_KINDS } from './constants'

/**
 * Generic Kubernetes operations client
 */
export class KubernetesClient {
  private readonly kubeConfig: k8s.KubeConfig
  private coreApi?: k8s.CoreV1Api
  private versionApi?: k8s.VersionApi
  private authApi?: k8s.AuthenticationV1Api
  private objectApi?: k8s.KubernetesObjectApi

  constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig
  }

  private getCoreApi(): k8s.CoreV1Api {
    if (!this.coreApi) {
      this.coreApi = this.kubeConfig.makeApiClient(k8s.CoreV1Api)
    }
    return this.coreApi
  }

  private getVersionApi(): k8s.VersionApi {
    if (!this.versionApi) {
      this.versionApi = this.kubeConfig.makeApiClient(k8s.VersionApi)
    }
    return this.versionApi
  }

  private getAuthApi(): k8s.AuthenticationV1Api {
    if (!this.authApi) {
      this.authApi = this.kubeConfig.makeApiClient(k8s.AuthenticationV1Api)
    }
    return this.authApi
  }

  private getObjectApi(): k8s.KubernetesObjectApi {
    if (!this.objectApi) {
      this.objectApi = k8s.KubernetesObjectApi.makeApiClient(this.kubeConfig)
    }
    return this.objectApi
  }

  /**
   * Read the server's git version (GET /version)
   */
  async getServerVersion(): Promise<string> {
    const info = await this.getVersionApi().getCode()
    return info.gitVersion
  }

  /**
   * Resolve the authenticated user (equivalent to kubectl auth whoami)
   */
  async whoAmI(): Promise<string | undefined> {
    const review = await this.getAuthApi().createSelfSubjectReview({
      body: {
        apiVersion: 'authentication.k8s.io/v1',
        kind: 'SelfSubjectReview'
      }
    })
    return review.status?.userInfo?.username
  }

  /**
   * Read an object by identity, returning null when it does not exist
   */
  async readObject(ref: ResourceRef): Promise<k8s.KubernetesObject | null> {
    try {
      return await this.getObjectApi().read({
        apiVersion: API_VERSIONS[ref.kind],
        kind: ref.kind,
        metadata: CLUSTER_SCOPED_KINDS.has(ref.kind)
          ? { name: ref.name }
          : { name: ref.name, namespace: ref.namespace }
      })
    } catch (error: unknown) {
      if (this.isNotFoundError(error)) {
        return null
      }
      throw error
    }
  }

  /**
   * Create an object that does not exist yet
   */
  async createObject(resource: ManifestObject): Promise<void> {
    await this.getObjectApi().create(
      resource,
      undefined, // pretty
      undefined, // dryRun
      FIELD_MANAGER
    )
    core.info(
      `✅ ${resource.kind} '${resource.metadata.name}' created successfully`
    )
  }

  /**
   * Update an existing object in place using Server-Side Apply
   */
  async applyObject(
    resource: ManifestObject,
    fieldManager: string = FIELD_MANAGER
  ): Promise<void> {
    await this.getObjectApi().patch(
      resource,
      undefined, // pretty
      undefined, // dryRun
      fieldManager, // identifies the reconciler
      true, // force (take ownership of conflicting fields)
      k8s.PatchStrategy.ServerSideApply
    )
    core.info(
      `✅ ${resource.kind} '${resource.metadata.name}' applied successfully`
    )
  }

  /**
   * Request a bounded token for a service account (TokenRequest API)
   */
  async requestServiceAccountToken(
    serviceAccount: string,
    namespace: string,
    expirationSeconds: number
  ): Promise<IssuedToken> {
    const response = await this.getCoreApi().createNamespacedServiceAccountToken(
      {
        name: serviceAccount,
        namespace,
        body: {
          apiVersion: 'authentication.k8s.io/v1',
          kind: 'TokenRequest',
          spec: {
            audiences: [],
            expirationSeconds
          }
        }
      }
    )

    if (!response.status?.token) {
      throw new Error(
        `TokenRequest for service account '${serviceAccount}' in namespace '${namespace}' returned no token`
      )
    }

    return {
      token: response.status.token,
      expirationTimestamp: new Date(response.status.expirationTimestamp)
    }
  }

  /**
   * Check if an error is a 404 Not Found error
   */
  isNotFoundError(error: unknown): boolean {
    return statusCodeOf(error) === 404
  }
}
