/**
 * Kubernetes label constants written on every applied object
 */
export const Labels = {
  MANAGED_BY: 'app.kubernetes.io/managed-by',
  PART_OF: 'app.kubernetes.io/part-of',
  COMPONENT: 'app.kubernetes.io/component'
} as const
