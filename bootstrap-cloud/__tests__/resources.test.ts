import { describe, it, expect } from 'vitest'
import {
  AGENT_RULES,
  buildResourceObjects,
  describeRef,
  refOf,
  sortByDependency
} from '../src/resources'
import { desiredState } from './fixtures'

describe('resources', () => {
  describe('buildResourceObjects', () => {
    it('should return objects in dependency order', () => {
      const objects = buildResourceObjects(desiredState())

      expect(objects.map((object) => refOf(object))).toEqual([
        { kind: 'Namespace', name: 'jenkins' },
        { kind: 'ServiceAccount', name: 'jenkins', namespace: 'jenkins' },
        { kind: 'ClusterRole', name: 'jenkins' },
        { kind: 'ClusterRoleBinding', name: 'jenkins' },
        { kind: 'PodTemplate', name: 'jnlp-agent', namespace: 'jenkins' }
      ])
    })

    it('should label every object as managed by the reconciler', () => {
      const objects = buildResourceObjects(desiredState())

      for (const object of objects) {
        expect(
          object.manifest.metadata.labels?.['app.kubernetes.io/managed-by']
        ).toBe('kube-agent-cloud')
      }
    })

    it('should bind the role to the service account', () => {
      const objects = buildResourceObjects(
        desiredState({
          namespace: 'ci',
          serviceAccount: 'controller',
          roleName: 'agents',
          bindingName: 'agents-binding'
        })
      )
      const binding = objects.find((o) => o.kind === 'ClusterRoleBinding')

      expect(binding?.name).toBe('agents-binding')
      expect(binding?.manifest.roleRef).toEqual({
        apiGroup: 'rbac.authorization.k8s.io',
        kind: 'ClusterRole',
        name: 'agents'
      })
      expect(binding?.manifest.subjects).toEqual([
        { kind: 'ServiceAccount', name: 'controller', namespace: 'ci' }
      ])
    })

    it('should grant pod management rules to the role', () => {
      const role = buildResourceObjects(desiredState()).find(
        (o) => o.kind === 'ClusterRole'
      )

      expect(role?.manifest.apiVersion).toBe('rbac.authorization.k8s.io/v1')
      expect(role?.manifest.rules).toBe(AGENT_RULES)
    })

    it('should describe the agent pod in the PodTemplate', () => {
      const template = buildResourceObjects(desiredState()).find(
        (o) => o.kind === 'PodTemplate'
      )

      expect(template?.manifest.template).toEqual({
        metadata: {
          labels: {
            'app.kubernetes.io/managed-by': 'kube-agent-cloud',
            'app.kubernetes.io/part-of': 'ci-agents',
            'app.kubernetes.io/component': 'agent'
          }
        },
        spec: {
          serviceAccountName: 'jenkins',
          restartPolicy: 'Never',
          containers: [
            {
              name: 'jnlp',
              image: 'jenkins/inbound-agent:latest',
              workingDir: '/home/jenkins/agent',
              tty: true,
              resources: {
                requests: { cpu: '200m', memory: '256Mi' },
                limits: { cpu: '500m', memory: '512Mi' }
              }
            }
          ]
        }
      })
    })
  })

  describe('sortByDependency', () => {
    it('should move referenced kinds first and keep ties in order', () => {
      const [namespace, serviceAccount, role, binding, template] =
        buildResourceObjects(desiredState())

      const sorted = sortByDependency([
        template,
        binding,
        role,
        serviceAccount,
        namespace
      ])

      expect(sorted.map((o) => o.kind)).toEqual([
        'Namespace',
        'ClusterRole',
        'ServiceAccount',
        'ClusterRoleBinding',
        'PodTemplate'
      ])
    })
  })

  describe('describeRef', () => {
    it('should include the namespace when present', () => {
      expect(
        describeRef({ kind: 'ServiceAccount', name: 'jenkins', namespace: 'ci' })
      ).toBe("ServiceAccount 'ci/jenkins'")
      expect(describeRef({ kind: 'ClusterRole', name: 'jenkins' })).toBe(
        "ClusterRole 'jenkins'"
      )
    })
  })
})
