import type { GitHubClientConfig } from '../../types/github-client-config'

import { TransportError } from '../errors/transport-error'

/**
 * Minimal subset of the Fetch API Response interface used by this module.
 * Implementations (node, polyfills, test doubles) must provide these members.
 */
interface FetchResponseLike {
  /** Read body as text. */
  text(): Promise<string>

  /** Status text provided by the server (e.g., "Forbidden"). */
  statusText: string

  /** Numeric HTTP status code. */
  status: number

  /** True when HTTP status indicates success (2xx). */
  ok: boolean
}

/**
 * Perform an HTTP request against GitHub API with auth and version headers.
 *
 * Every failure is reported as a `TransportError`: network errors and
 * timeouts (while connecting or reading the body) without a status, non-2xx responses with their status and body.
 *
 * @param config - Client config with token, base URL and timeout.
 * @param path - API path beginning with '/'.
 * @param options - Request init options.
 * @returns Response status and parsed JSON body (null for an empty body).
 */
export async function makeRequest(
  config: GitHubClientConfig,
  path: string,
  options: RequestInit = {},
): Promise<{ status: number; data: unknown }> {
  let headers: Record<string, string> = {
    'X-GitHub-Api-Version': config.apiVersion,
    Authorization: `Bearer ${config.token}`,
    Accept: 'application/vnd.github+json',
    'User-Agent': config.userAgent,
  }

  if (options.body !== undefined) {
    headers['Content-Type'] = 'application/json'
  }

  let response: FetchResponseLike
  let text: string
  try {
    response = await fetch(`${config.baseUrl}${path}`, {
      ...options,
      signal: AbortSignal.timeout(config.timeout),
      headers,
    })
    /** The timeout signal also covers reading the body. */
    text = await response.text()
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new TransportError(
        `GitHub API request timed out after ${config.timeout} ms`,
      )
    }
    throw new TransportError(
      `GitHub API request failed: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  if (!response.ok) {
    let message = `GitHub API error: ${response.status} ${response.statusText}`
    if (response.status === 403 && text.includes('rate limit')) {
      message = 'GitHub API rate limit exceeded'
    }
    throw new TransportError(message.trim(), {
      status: response.status,
      body: text,
    })
  }

  if (text.trim() === '') {
    return { status: response.status, data: null }
  }

  try {
    return { data: JSON.parse(text) as unknown, status: response.status }
  } catch {
    throw new TransportError('GitHub API returned invalid JSON', {
      status: response.status,
      body: text,
    })
  }
}
