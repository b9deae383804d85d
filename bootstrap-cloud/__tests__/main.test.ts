import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import * as core from '@actions/core'
import * as k8s from '@kubernetes/client-node'
import { run } from '../src/main'

describe('run', () => {
  let mockKubeConfig: k8s.KubeConfig

  beforeEach(() => {
    vi.clearAllMocks()
    vi.spyOn(core, 'info').mockImplementation(() => {})
    vi.spyOn(core, 'warning').mockImplementation(() => {})
    vi.spyOn(core, 'error').mockImplementation(() => {})
    vi.spyOn(core, 'setFailed').mockImplementation(() => {})
    vi.spyOn(core, 'setSecret').mockImplementation(() => {})

    mockKubeConfig = {
      loadFromDefault: vi.fn(),
      loadFromFile: vi.fn(),
      getContexts: vi.fn().mockReturnValue([{ name: 'test-context' }]),
      setCurrentContext: vi.fn(),
      getCurrentCluster: vi.fn().mockReturnValue(null),
      makeApiClient: vi.fn()
    } as unknown as k8s.KubeConfig

    vi.spyOn(k8s, 'KubeConfig').mockImplementation(function () {
      return mockKubeConfig
    })
  })

  afterEach(() => {
    process.exitCode = undefined
  })

  it('should exit with the configuration code when the context is missing', async () => {
    vi.spyOn(core, 'getInput').mockImplementation((name) =>
      name === 'kube-context' ? 'missing-context' : ''
    )

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      "\x1b[1;31mERROR ❌ [configuration] Context 'missing-context' does not exist\x1b[0m"
    )
    expect(process.exitCode).toBe(1)
  })

  it('should exit with the configuration code when no endpoint is known', async () => {
    vi.spyOn(core, 'getInput').mockImplementation((name) =>
      name === 'controller-url'
        ? 'http://jenkins.test:8080'
        : name === 'tunnel-address'
          ? 'jenkins-agent:50000'
          : ''
    )

    await run()

    expect(core.setFailed).toHaveBeenCalledWith(
      "\x1b[1;31mERROR ❌ [configuration] 'externalEndpoint' is required when the kubeconfig has no current cluster\x1b[0m"
    )
    expect(process.exitCode).toBe(1)
  })

  it('should remove its signal handlers when done', async () => {
    vi.spyOn(core, 'getInput').mockReturnValue('')
    const before = process.listenerCount('SIGTERM')

    await run()

    expect(process.listenerCount('SIGTERM')).toBe(before)
  })
})
