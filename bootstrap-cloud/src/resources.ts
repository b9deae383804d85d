import {
  API_VERSIONS,
  Labels,
  ManifestObject,
  ResourceKind,
  ResourceRef
} from '@kube-agent-cloud/k8s-client'
import { FIELD_MANAGER } from '@kube-agent-cloud/shared/constants'
import { DesiredState, ResourceObject } from './types'

/**
 * Apply rank per kind; lower ranks are referenced by higher ones
 */
export const KIND_ORDER: Record<ResourceKind, number> = {
  Namespace: 0,
  ServiceAccount: 1,
  ClusterRole: 1,
  ClusterRoleBinding: 2,
  PodTemplate: 3
}

/**
 * Permissions the controller needs to run agent pods
 */
export const AGENT_RULES = [
  {
    apiGroups: [''],
    resources: ['pods', 'pods/exec'],
    verbs: ['create', 'delete', 'get', 'list', 'patch', 'update', 'watch']
  },
  {
    apiGroups: [''],
    resources: ['pods/log', 'events'],
    verbs: ['get', 'list', 'watch']
  },
  {
    apiGroups: [''],
    resources: ['secrets'],
    verbs: ['get']
  }
]

function labelsFor(component: string): Record<string, string> {
  return {
    [Labels.MANAGED_BY]: FIELD_MANAGER,
    [Labels.PART_OF]: 'ci-agents',
    [Labels.COMPONENT]: component
  }
}

function toResourceObject(manifest: ManifestObject): ResourceObject {
  return {
    kind: manifest.kind,
    name: manifest.metadata.name,
    namespace: manifest.metadata.namespace,
    manifest
  }
}

export function refOf(object: ResourceObject): ResourceRef {
  return object.namespace === undefined
    ? { kind: object.kind, name: object.name }
    : { kind: object.kind, name: object.name, namespace: object.namespace }
}

export function describeRef(ref: ResourceRef): string {
  return ref.namespace
    ? `${ref.kind} '${ref.namespace}/${ref.name}'`
    : `${ref.kind} '${ref.name}'`
}

/**
 * Stable sort into dependency order
 */
export function sortByDependency(objects: ResourceObject[]): ResourceObject[] {
  return [...objects].sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind])
}

/**
 * Build every cluster object the controller relies on, in apply order
 */
export function buildResourceObjects(desired: DesiredState): ResourceObject[] {
  const template = desired.podTemplate

  const manifests: ManifestObject[] = [
    {
      apiVersion: API_VERSIONS.Namespace,
      kind: 'Namespace',
      metadata: {
        name: desired.namespace,
        labels: labelsFor('namespace')
      }
    },
    {
      apiVersion: API_VERSIONS.ServiceAccount,
      kind: 'ServiceAccount',
      metadata: {
        name: desired.serviceAccount,
        namespace: desired.namespace,
        labels: labelsFor('controller')
      }
    },
    {
      apiVersion: API_VERSIONS.ClusterRole,
      kind: 'ClusterRole',
      metadata: {
        name: desired.roleName,
        labels: labelsFor('rbac')
      },
      rules: AGENT_RULES
    },
    {
      apiVersion: API_VERSIONS.ClusterRoleBinding,
      kind: 'ClusterRoleBinding',
      metadata: {
        name: desired.bindingName,
        labels: labelsFor('rbac')
      },
      roleRef: {
        apiGroup: 'rbac.authorization.k8s.io',
        kind: 'ClusterRole',
        name: desired.roleName
      },
      subjects: [
        {
          kind: 'ServiceAccount',
          name: desired.serviceAccount,
          namespace: desired.namespace
        }
      ]
    },
    {
      apiVersion: API_VERSIONS.PodTemplate,
      kind: 'PodTemplate',
      metadata: {
        name: template.name,
        namespace: desired.namespace,
        labels: labelsFor('agent')
      },
      template: {
        metadata: {
          labels: labelsFor('agent')
        },
        spec: {
          serviceAccountName: desired.serviceAccount,
          restartPolicy: 'Never',
          containers: [
            {
              name: 'jnlp',
              image: template.image,
              workingDir: template.workingDir,
              tty: true,
              resources: {
                requests: {
                  cpu: template.cpuRequest,
                  memory: template.memoryRequest
                },
                limits: {
                  cpu: template.cpuLimit,
                  memory: template.memoryLimit
                }
              }
            }
          ]
        }
      }
    }
  ]

  return sortByDependency(manifests.map(toResourceObject))
}
