import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { GitHubClientConfig } from '../../types/github-client-config'

import { ReleaseCreationError } from '../../core/errors/release-creation-error'
import { TransportError } from '../../core/errors/transport-error'
import { createRelease } from '../../core/api/create-release'

describe('createRelease', () => {
  beforeEach(() => vi.restoreAllMocks())

  function config(): GitHubClientConfig {
    return {
      baseUrl: 'https://api.github.com',
      userAgent: 'upstream-release',
      apiVersion: '2022-11-28',
      token: 'test-token',
      timeout: 500,
    }
  }

  function respond(body: string, status: number): void {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(body, { status }),
    )
  }

  it('posts the release and returns the created release', async () => {
    respond(
      JSON.stringify({
        html_url: 'https://github.com/owner/repo/releases/tag/2024.06',
        tag_name: '2024.06',
        id: 42,
      }),
      201,
    )

    let result = await createRelease(config(), {
      repository: 'owner/repo',
      body: 'Mirrored',
      tag: '2024.06',
    })

    expect(result).toEqual({
      url: 'https://github.com/owner/repo/releases/tag/2024.06',
      tag: '2024.06',
      id: 42,
    })

    let [url, init] = vi.mocked(fetch).mock.calls[0]!
    expect(url).toBe('https://api.github.com/repos/owner/repo/releases')
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toEqual({
      target_commitish: 'main',
      tag_name: '2024.06',
      name: '2024.06',
      body: 'Mirrored',
    })
  })

  it('uses the given base branch', async () => {
    respond('{}', 201)

    await createRelease(config(), {
      repository: 'owner/repo',
      baseBranch: 'develop',
      tag: '2024.06',
      body: '',
    })

    let [, init] = vi.mocked(fetch).mock.calls[0]!
    expect(JSON.parse(String(init?.body))).toHaveProperty(
      'target_commitish',
      'develop',
    )
  })

  it('falls back to the requested tag when GitHub omits fields', async () => {
    respond('', 201)

    await expect(
      createRelease(config(), {
        repository: 'owner/repo',
        tag: '2024.06',
        body: '',
      }),
    ).resolves.toEqual({ tag: '2024.06', url: null, id: null })
  })

  it('counts a 201 with an unreadable body as created', async () => {
    respond('<html>', 201)

    await expect(
      createRelease(config(), {
        repository: 'owner/repo',
        tag: '2024.06',
        body: '',
      }),
    ).resolves.toEqual({ tag: '2024.06', url: null, id: null })
  })

  it('reports rejected releases with status and body', async () => {
    respond('{"message":"Validation Failed"}', 422)

    let promise = createRelease(config(), {
      repository: 'owner/repo',
      tag: '2024.06',
      body: '',
    })
    await expect(promise).rejects.toBeInstanceOf(ReleaseCreationError)
    await expect(promise).rejects.toMatchObject({
      message: 'Failed to create release: 422 {"message":"Validation Failed"}',
      body: '{"message":"Validation Failed"}',
      status: 422,
    })
  })

  it('treats a success status other than 201 as a failure', async () => {
    respond('{"id":1}', 200)

    await expect(
      createRelease(config(), {
        repository: 'owner/repo',
        tag: '2024.06',
        body: '',
      }),
    ).rejects.toMatchObject({ kind: 'release-creation', body: '{"id":1}' })
  })

  it('keeps network failures as TransportError', async () => {
    vi.spyOn(globalThis, 'fetch').mockRejectedValue(
      new TypeError('fetch failed'),
    )

    let promise = createRelease(config(), {
      repository: 'owner/repo',
      tag: '2024.06',
      body: '',
    })
    await expect(promise).rejects.toBeInstanceOf(TransportError)
    await expect(promise).rejects.not.toBeInstanceOf(ReleaseCreationError)
  })
})
