import * as core from '@actions/core'
import { formatDuration } from '@kube-agent-cloud/shared/time-utils'
import { describeRef } from './resources'
import { ActivationResult, AppliedObject, RunReport } from './types'

const OUTCOME_ICON = {
  created: '🆕',
  updated: '🔄',
  unchanged: '✔️'
} as const

export function formatAppliedObjects(objects: AppliedObject[]): string[] {
  return objects.map(
    (object) =>
      `${OUTCOME_ICON[object.outcome]} ${describeRef(object.ref)}: ${object.outcome}`
  )
}

export function describeActivation(activation: ActivationResult): string {
  if (activation.outcome === 'pending-restart') {
    return `Controller already running (HTTP ${activation.status}); configuration takes effect on its next restart`
  }
  return `Controller live after ${formatDuration(activation.elapsedMs)} (${activation.attempts} attempt(s), configuration ${activation.outcome})`
}

/**
 * Report a finished run in the log, and as a step summary when the runner
 * provides one
 */
export async function generateRunSummary(
  report: RunReport,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  core.startGroup('Generating run summary')

  formatAppliedObjects(report.applied.objects).forEach((line) =>
    core.info(line)
  )
  core.info(
    `Credential for '${report.credential.subject.namespace}/${report.credential.subject.serviceAccount}' ${report.credential.reused ? 'reused' : 'issued'}, expires ${report.credential.expiresAt.toISOString()}`
  )
  if (report.activation.outcome === 'pending-restart') {
    core.warning(describeActivation(report.activation))
  } else {
    core.info(describeActivation(report.activation))
  }

  if (env.GITHUB_STEP_SUMMARY) {
    await core.summary
      .addHeading('✅ Kubernetes cloud configured', 2)
      .addHeading('Run details', 3)
      .addTable([
        [
          { data: 'Field', header: true },
          { data: 'Value', header: true }
        ],
        [{ data: 'Kubernetes version' }, { data: report.serverVersion }],
        [
          { data: 'Applied objects' },
          { data: formatAppliedObjects(report.applied.objects).join('<br>') }
        ],
        [
          { data: 'Credential expires' },
          { data: report.credential.expiresAt.toISOString() }
        ],
        [{ data: 'Configuration file' }, { data: report.configPath }],
        [{ data: 'Activation' }, { data: report.activation.outcome }]
      ])
      .addRaw(
        `\n---\n*Run timestamp: ${new Date().toISOString().replace('T', ' ').substring(0, 19)} UTC*`
      )
      .write()
  }

  core.endGroup()
}
