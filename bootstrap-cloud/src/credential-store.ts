import * as core from '@actions/core'
import * as fs from 'fs'
import * as path from 'path'
import { sanitizeName } from '@kube-agent-cloud/shared/string-utils'
import { errorMessage } from '@kube-agent-cloud/shared/errors'
import { Credential, CredentialSubject } from './types'

/**
 * Persistence of the last issued credential per subject
 */
export interface CredentialStore {
  load(subject: CredentialSubject): Promise<Credential | undefined>
  save(credential: Credential): Promise<void>
}

interface StoredCredential {
  value: string
  issuedAt: string
  expiresAt: string
  subject: CredentialSubject
  cluster?: string
}

function parseStoredCredential(data: unknown): Credential | undefined {
  if (
    typeof data !== 'object' ||
    data === null ||
    !('value' in data) ||
    !('issuedAt' in data) ||
    !('expiresAt' in data) ||
    !('subject' in data)
  ) {
    return undefined
  }
  const { value, subject } = data

  if (
    typeof value !== 'string' ||
    typeof data.issuedAt !== 'string' ||
    typeof data.expiresAt !== 'string' ||
    typeof subject !== 'object' ||
    subject === null ||
    !('namespace' in subject) ||
    !('serviceAccount' in subject) ||
    typeof subject.namespace !== 'string' ||
    typeof subject.serviceAccount !== 'string'
  ) {
    return undefined
  }

  const issuedAt = new Date(data.issuedAt)
  const expiresAt = new Date(data.expiresAt)
  if (isNaN(issuedAt.getTime()) || isNaN(expiresAt.getTime())) {
    return undefined
  }

  const credential: Credential = {
    value,
    issuedAt,
    expiresAt,
    subject: {
      namespace: subject.namespace,
      serviceAccount: subject.serviceAccount
    }
  }
  if ('cluster' in data && typeof data.cluster === 'string') {
    credential.cluster = data.cluster
  }
  return credential
}

/**
 * Stores one JSON record per subject under a state directory, readable by the
 * owner only.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly directory: string

  constructor(directory: string) {
    this.directory = directory
  }

  pathFor(subject: CredentialSubject): string {
    return path.join(
      this.directory,
      `${sanitizeName(subject.namespace)}.${sanitizeName(subject.serviceAccount)}.token.json`
    )
  }

  async load(subject: CredentialSubject): Promise<Credential | undefined> {
    const file = this.pathFor(subject)

    let raw: string
    try {
      raw = await fs.promises.readFile(file, 'utf8')
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return undefined
      }
      throw new Error(
        `Failed to read stored credential ${file}: ${errorMessage(error)}`
      )
    }

    let credential: Credential | undefined
    try {
      credential = parseStoredCredential(JSON.parse(raw))
    } catch {
      credential = undefined
    }

    if (
      !credential ||
      credential.subject.namespace !== subject.namespace ||
      credential.subject.serviceAccount !== subject.serviceAccount
    ) {
      core.warning(`Ignoring unreadable credential record at ${file}`)
      return undefined
    }
    return credential
  }

  async save(credential: Credential): Promise<void> {
    const file = this.pathFor(credential.subject)
    const record: StoredCredential = {
      value: credential.value,
      issuedAt: credential.issuedAt.toISOString(),
      expiresAt: credential.expiresAt.toISOString(),
      subject: credential.subject
    }
    if (credential.cluster !== undefined) {
      record.cluster = credential.cluster
    }

    await fs.promises.mkdir(this.directory, { recursive: true, mode: 0o700 })
    const temporary = `${file}.${process.pid}.tmp`
    await fs.promises.writeFile(temporary, JSON.stringify(record, null, 2), {
      mode: 0o600
    })
    await fs.promises.rename(temporary, file)
  }
}
