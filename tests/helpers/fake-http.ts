import { AxiosError, type AxiosAdapter, type AxiosRequestHeaders } from 'axios'

export type FakeReply =
  | { status: number; data?: unknown }
  | { error: 'ECONNABORTED' | 'ECONNREFUSED' }

export interface RecordedRequest {
  url: string
  params: Record<string, unknown>
  headers: AxiosRequestHeaders
  timeout: number | undefined
}

export type Route = FakeReply | ((request: RecordedRequest, call: number) => FakeReply)

export function ok(data: unknown): FakeReply {
  return { status: 200, data }
}

/**
 * In-process axios transport. Routes are keyed by full URL (base + path);
 * unknown URLs answer 404. Every request is recorded.
 */
export function fakeTransport(routes: Record<string, Route>) {
  const requests: RecordedRequest[] = []
  const calls = new Map<string, number>()

  const adapter: AxiosAdapter = async (config) => {
    const url = `${config.baseURL ?? ''}${config.url ?? ''}`
    const params: Record<string, unknown> = { ...config.params }
    const request = { url, params, headers: config.headers, timeout: config.timeout }
    requests.push(request)

    const call = (calls.get(url) ?? 0) + 1
    calls.set(url, call)

    const route = routes[url]
    const reply = route === undefined
      ? { status: 404, data: { message: 'not found' } }
      : typeof route === 'function' ? route(request, call) : route

    if ('error' in reply) {
      throw new AxiosError(`fake ${reply.error}`, reply.error, config)
    }

    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    }
  }

  return { adapter, requests }
}
