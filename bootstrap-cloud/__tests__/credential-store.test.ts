import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { FileCredentialStore } from '../src/credential-store'
import { credential } from './fixtures'

describe('FileCredentialStore', () => {
  let dir: string
  let store: FileCredentialStore

  const subject = { namespace: 'jenkins', serviceAccount: 'jenkins' }

  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(core, 'warning').mockImplementation(() => {})
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'credential-store-'))
    store = new FileCredentialStore(path.join(dir, 'state'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should name the record after the subject', () => {
    expect(
      store.pathFor({ namespace: 'CI', serviceAccount: 'jenkins_controller' })
    ).toBe(path.join(dir, 'state', 'ci.jenkins-controller.token.json'))
  })

  it('should return undefined when nothing is stored', async () => {
    await expect(store.load(subject)).resolves.toBeUndefined()
    expect(core.warning).not.toHaveBeenCalled()
  })

  it('should load what it saved', async () => {
    const saved = credential()

    await store.save(saved)

    await expect(store.load(subject)).resolves.toEqual(saved)
  })

  it('should write the record readable by its owner only', async () => {
    await store.save(credential())

    const mode = fs.statSync(store.pathFor(subject)).mode & 0o777
    expect(mode).toBe(0o600)
  })

  it('should store timestamps as ISO strings', async () => {
    await store.save(credential())

    const record = JSON.parse(fs.readFileSync(store.pathFor(subject), 'utf8'))
    expect(record).toEqual({
      value: 'test-secret-token',
      issuedAt: '2026-10-19T00:00:00.000Z',
      expiresAt: '2027-10-19T00:00:00.000Z',
      subject: { namespace: 'jenkins', serviceAccount: 'jenkins' }
    })
  })

  it('should keep the API server the token was issued by', async () => {
    await store.save(credential({ cluster: 'https://10.0.0.1:6443' }))

    const record = JSON.parse(fs.readFileSync(store.pathFor(subject), 'utf8'))
    expect(record.cluster).toBe('https://10.0.0.1:6443')
    await expect(store.load(subject)).resolves.toMatchObject({
      cluster: 'https://10.0.0.1:6443'
    })
  })

  it('should ignore a corrupt record', async () => {
    fs.mkdirSync(path.join(dir, 'state'))
    fs.writeFileSync(store.pathFor(subject), '{not json')

    await expect(store.load(subject)).resolves.toBeUndefined()
    expect(core.warning).toHaveBeenCalledWith(
      `Ignoring unreadable credential record at ${store.pathFor(subject)}`
    )
  })

  it('should ignore a record for another subject', async () => {
    fs.mkdirSync(path.join(dir, 'state'))
    fs.writeFileSync(
      store.pathFor(subject),
      JSON.stringify({
        value: 'test-secret-token',
        issuedAt: '2026-10-19T00:00:00.000Z',
        expiresAt: '2027-10-19T00:00:00.000Z',
        subject: { namespace: 'other', serviceAccount: 'jenkins' }
      })
    )

    await expect(store.load(subject)).resolves.toBeUndefined()
    expect(core.warning).toHaveBeenCalledTimes(1)
  })
})
