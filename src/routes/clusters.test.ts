import { afterEach, describe, expect, it } from 'vitest'

import { availableReport, gcpSpec, makeTestRuntime } from '@/clusters/__tests__/test-stack'
import { createClusterHandlers } from '@/routes/clusters'

const BASE_URL = 'http://localhost/api/v1/clusters'
const OWNER = { 'x-user-email': 'ops@example.com' }
const STRANGER = { 'x-user-email': 'dev@example.com' }
const CONTROLLER = { 'x-user-email': 'controller@system.local' }

const runtimes: ReturnType<typeof makeTestRuntime>[] = []

const setup = (env: NodeJS.ProcessEnv = {}) => {
  const stack = makeTestRuntime({ env })
  runtimes.push(stack)
  return createClusterHandlers({ runtime: stack.runtime })
}

afterEach(async () => {
  await Promise.all(runtimes.splice(0).map((stack) => stack.runtime.dispose()))
})

const send = (method: string, url: string, headers: Record<string, string> = {}, body?: unknown) =>
  new Request(url, {
    method,
    headers: { 'content-type': 'application/json', ...headers },
    body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
  })

const createEdge = async (handlers: ReturnType<typeof setup>) => {
  const response = await handlers.create(send('POST', BASE_URL, OWNER, { name: 'edge', spec: gcpSpec() }))
  const body: unknown = await response.json()
  const id = typeof body === 'object' && body !== null && 'id' in body ? String(body.id) : ''
  return { response, body, id }
}

describe('cluster handlers', () => {
  it('creates a cluster with location and etag headers', async () => {
    const handlers = setup()

    const { response, body, id } = await createEdge(handlers)

    expect(response.status).toBe(201)
    expect(response.headers.get('content-type')).toBe('application/json')
    expect(response.headers.get('location')).toBe(`/api/v1/clusters/${id}`)
    expect(response.headers.get('etag')).toBe('"1"')
    expect(body).toMatchObject({
      name: 'edge',
      generation: 1,
      createdBy: 'ops@example.com',
      status: { phase: 'Pending' },
    })
  })

  it('answers 401 without a caller identity', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const created = await handlers.create(send('POST', BASE_URL, {}, { name: 'edge', spec: gcpSpec() }))
    const fetched = await handlers.get(send('GET', `${BASE_URL}/${id}`, { 'x-user-email': '  ' }), id)

    expect(created.status).toBe(401)
    expect(await created.json()).toEqual({
      error: { kind: 'Unauthorized', message: 'missing caller identity', retryable: false },
    })
    expect(fetched.status).toBe(401)
  })

  it('rejects malformed JSON bodies', async () => {
    const handlers = setup()

    const response = await handlers.create(send('POST', BASE_URL, OWNER, '{"name":'))

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({
      error: { kind: 'Invalid', message: 'request body must be valid JSON', retryable: false, issues: [] },
    })
  })

  it('uses If-Match as the expected generation', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const updated = await handlers.update(
      send('PUT', `${BASE_URL}/${id}`, { ...OWNER, 'if-match': '"1"' }, { spec: gcpSpec('us-east1') }),
      id,
    )
    const stale = await handlers.update(
      send('PUT', `${BASE_URL}/${id}`, { ...OWNER, 'if-match': 'W/"1"' }, { spec: gcpSpec('us-west1') }),
      id,
    )

    expect(updated.status).toBe(200)
    expect(updated.headers.get('etag')).toBe('"2"')
    expect(stale.status).toBe(409)
    expect(await stale.json()).toMatchObject({
      error: {
        kind: 'Conflict',
        message: 'generation mismatch: expected 1, current 2',
        retryable: false,
        current: { generation: 2, spec: { platform: { region: 'us-east1' } } },
      },
    })
  })

  it('rejects an unparseable If-Match header', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const response = await handlers.update(
      send('PUT', `${BASE_URL}/${id}`, { ...OWNER, 'if-match': 'latest' }, { spec: gcpSpec() }),
      id,
    )

    expect(response.status).toBe(400)
    expect(await response.json()).toMatchObject({
      error: { issues: ['If-Match: expected a generation, got latest'] },
    })
  })

  it('returns 404 for unknown clusters', async () => {
    const handlers = setup()

    const response = await handlers.get(send('GET', `${BASE_URL}/missing`, OWNER), 'missing')

    expect(response.status).toBe(404)
    expect(await response.json()).toEqual({
      error: { kind: 'NotFound', message: 'cluster missing not found', retryable: false },
    })
  })

  it('hides clusters from callers who did not create them', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const fetched = await handlers.get(send('GET', `${BASE_URL}/${id}`, STRANGER), id)
    const updated = await handlers.update(send('PUT', `${BASE_URL}/${id}`, STRANGER, { spec: gcpSpec() }), id)
    const removed = await handlers.remove(send('DELETE', `${BASE_URL}/${id}?force=true`, STRANGER), id)
    const listed = await handlers.list(send('GET', BASE_URL, STRANGER))
    const asController = await handlers.get(send('GET', `${BASE_URL}/${id}`, CONTROLLER), id)

    expect(fetched.status).toBe(404)
    expect(updated.status).toBe(404)
    expect(removed.status).toBe(404)
    expect(await listed.json()).toEqual({ records: [], total: 0, limit: 50, offset: 0 })
    expect(asController.status).toBe(200)
  })

  it('accepts controller reports and serves the aggregated status', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const pushed = await handlers.pushStatus(
      send('PUT', `${BASE_URL}/${id}/status`, CONTROLLER, availableReport('gcp', 1)),
      id,
    )
    const status = await handlers.getStatus(send('GET', `${BASE_URL}/${id}/status`, OWNER), id)

    expect(pushed.status).toBe(200)
    expect(await pushed.json()).toEqual({
      id,
      generation: 1,
      phase: 'Ready',
      controllerName: 'gcp',
      stale: false,
      removed: false,
    })
    expect(status.status).toBe(200)
    expect(await status.json()).toMatchObject({
      phase: 'Ready',
      reason: 'ControllersAvailable',
      observedGeneration: 1,
    })
  })

  it('answers 403 when a user pushes a controller report', async () => {
    const handlers = setup()
    const { id } = await createEdge(handlers)

    const response = await handlers.pushStatus(
      send('PUT', `${BASE_URL}/${id}/status`, OWNER, availableReport('gcp', 1)),
      id,
    )

    expect(response.status).toBe(403)
    expect(await response.json()).toEqual({
      error: {
        kind: 'Forbidden',
        message: 'caller ops@example.com may not report controller status',
        retryable: false,
      },
    })
  })

  it('lists clusters with query filters', async () => {
    const handlers = setup()
    await createEdge(handlers)

    const response = await handlers.list(send('GET', `${BASE_URL}?platform=gcp&limit=1`, OWNER))
    const empty = await handlers.list(send('GET', `${BASE_URL}?platform=aws&phase=`, OWNER))
    const invalid = await handlers.list(send('GET', `${BASE_URL}?limit=-1`, OWNER))

    expect(response.status).toBe(200)
    expect(await response.json()).toMatchObject({ total: 1, limit: 1, offset: 0 })
    expect(await empty.json()).toEqual({ records: [], total: 0, limit: 50, offset: 0 })
    expect(invalid.status).toBe(400)
    expect(await invalid.json()).toMatchObject({ error: { issues: ['limit: must be a non-negative integer'] } })
  })

  it('answers 200 for a removal and 202 for a requested deletion', async () => {
    const hard = setup()
    const graceful = setup({ ORDU_DELETION_MODE: 'graceful' })
    const first = await createEdge(hard)
    const second = await createEdge(graceful)
    await graceful.pushStatus(
      send('PUT', `${BASE_URL}/${second.id}/status`, CONTROLLER, availableReport('gcp', 1)),
      second.id,
    )

    const removed = await hard.remove(send('DELETE', `${BASE_URL}/${first.id}`, OWNER), first.id)
    const requested = await graceful.remove(send('DELETE', `${BASE_URL}/${second.id}`, OWNER), second.id)
    const forced = await graceful.remove(send('DELETE', `${BASE_URL}/${second.id}?force=true`, OWNER), second.id)

    expect(removed.status).toBe(200)
    expect(await removed.json()).toEqual({ id: first.id, removed: true, phase: 'Pending' })
    expect(requested.status).toBe(202)
    expect(await requested.json()).toEqual({ id: second.id, removed: false, phase: 'Terminating' })
    expect(forced.status).toBe(200)
    expect(await forced.json()).toEqual({ id: second.id, removed: true, phase: 'Terminating' })
  })
})
