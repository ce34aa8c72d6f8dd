import type { RecentFriend, ReceiptId, SplitBackend, SplitRecord, SplitRequest } from '../types/domain'
import { SplitError, toSplitError } from './splitErrors'
import { encodeSplitRequest, isRecord, parseRecentFriends, parseSplitRecord } from './splitPayload'

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface HttpSplitBackendOptions {
  apiBase: string
  getAuthToken: () => Promise<string>
  timeoutMs?: number
  fetchImpl?: FetchLike
}

type RequestOptions = {
  method: 'GET' | 'POST'
  body?: unknown
  allowEmpty?: boolean
}

function parseErrorMessage(text: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(text)
    if (!isRecord(parsed)) {
      return undefined
    }
    return [parsed.error, parsed.message, parsed.detail].find(
      (value): value is string => typeof value === 'string' && value.length > 0,
    )
  } catch {
    return undefined
  }
}

function errorForStatus(status: number, text: string): SplitError {
  if (status === 401) {
    return new SplitError('server-rejected', 'Unauthorized - please sign in again')
  }
  if (status === 404) {
    return new SplitError('not-found')
  }
  if (status >= 400 && status < 500) {
    return new SplitError('server-rejected', parseErrorMessage(text) ?? `Client error: ${status}`)
  }
  if (status >= 500 && status < 600) {
    return new SplitError('server-rejected', parseErrorMessage(text) ?? `Server error: ${status}`)
  }
  return new SplitError('server-rejected', `Unexpected status code: ${status}`)
}

export function createHttpSplitBackend({
  apiBase,
  getAuthToken,
  timeoutMs = 30_000,
  fetchImpl = (url, init) => fetch(url, init),
}: HttpSplitBackendOptions): SplitBackend {
  const baseUrl = apiBase.replace(/\/+$/, '')

  async function request(endpoint: string, { method, body, allowEmpty = false }: RequestOptions): Promise<unknown> {
    const token = await getAuthToken()
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${token}`,
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    let response: Response
    try {
      response = await fetchImpl(`${baseUrl}${endpoint}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      throw toSplitError(error)
    }

    const text = await response.text()
    if (!response.ok) {
      throw errorForStatus(response.status, text)
    }

    if (text.trim() === '' || text.trim() === 'null') {
      if (allowEmpty) {
        return null
      }
      throw new SplitError('server-rejected', 'Failed to decode response: empty body')
    }

    try {
      return JSON.parse(text)
    } catch (error) {
      throw new SplitError(
        'server-rejected',
        `Failed to decode response: ${error instanceof Error ? error.message : 'invalid JSON'}`,
      )
    }
  }

  async function fetchExisting(receiptId: ReceiptId): Promise<SplitRecord | null> {
    try {
      const payload = await request(`/expense-splits/receipt/${encodeURIComponent(receiptId)}`, {
        method: 'GET',
        allowEmpty: true,
      })
      return payload === null ? null : parseSplitRecord(payload)
    } catch (error) {
      if (error instanceof SplitError && error.kind === 'not-found') {
        return null
      }
      throw error
    }
  }

  async function save(splitRequest: SplitRequest): Promise<SplitRecord> {
    const payload = await request('/expense-splits', {
      method: 'POST',
      body: encodeSplitRequest(splitRequest),
    })
    return parseSplitRecord(payload)
  }

  async function fetchRecentFriends(limit = 10): Promise<RecentFriend[]> {
    const payload = await request(`/expense-splits/recent-friends?limit=${limit}`, { method: 'GET' })
    return parseRecentFriends(payload)
  }

  return {
    fetchExisting,
    save,
    fetchRecentFriends,
  }
}
