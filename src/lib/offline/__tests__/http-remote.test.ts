import {
  AuthFailure,
  CancelledFailure,
  NetworkFailure,
  NotFoundFailure,
  ServerFailure,
  SyncConflict,
  ValidationFailure,
} from '@/lib/errors';
import { HttpRemoteApi, failureForStatus } from '../http-remote';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createApi(fetchImpl: typeof fetch, timeoutMs = 1000): HttpRemoteApi {
  return new HttpRemoteApi({
    baseUrl: 'http://mill.test/api/',
    timeoutMs,
    getAuthToken: () => 'test-token',
    fetchImpl,
  });
}

describe('HttpRemoteApi', () => {
  it('unwraps the response envelope and sends the session token', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(json({ success: true, data: [{ id: 1 }], message: 'ok' }));

    const result = await createApi(fetchImpl).get('/customers/updates');

    expect(result).toEqual({ ok: true, value: { success: true, statusCode: 200, data: [{ id: 1 }], message: 'ok' } });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://mill.test/api/customers/updates');
    expect(init?.method).toBe('GET');
    const headers = new Headers(init?.headers);
    expect(headers.get('authorization')).toBe('Bearer test-token');
    expect(headers.get('content-type')).toBeNull();
  });

  it('sends the body and the mutation id', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(json({ id: 'cust-1' }, 201));

    const result = await createApi(fetchImpl).post('/customers', { name: 'Ravi' }, { clientMutationId: 'mut-1' });

    expect(result).toEqual({ ok: true, value: { success: true, statusCode: 201, data: { id: 'cust-1' }, message: null } });
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"name":"Ravi"}');
    const headers = new Headers(init?.headers);
    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('x-client-mutation-id')).toBe('mut-1');
  });

  it('keeps an explicit unsuccessful envelope', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(json({ success: false, message: 'Duplicate entry' }));

    const result = await createApi(fetchImpl).post('/customers', {});

    expect(result).toEqual({
      ok: true,
      value: { success: false, statusCode: 200, data: { success: false, message: 'Duplicate entry' }, message: 'Duplicate entry' },
    });
  });

  it('treats an empty body as no data', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));

    const result = await createApi(fetchImpl).delete('/customers/cust-1');

    expect(result.ok && result.value.data).toBeNull();
  });

  it('maps rejected statuses onto failures', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(json({ message: 'Token expired' }, 401))
      .mockResolvedValueOnce(json({ error: 'Phone already registered' }, 409))
      .mockResolvedValueOnce(json({ message: 'Phone is invalid' }, 422))
      .mockResolvedValueOnce(new Response('upstream down', { status: 503 }));
    const api = createApi(fetchImpl);

    const auth = await api.get('/customers/updates');
    const conflict = await api.post('/customers', {});
    const invalid = await api.post('/customers', {});
    const server = await api.post('/customers', {});

    expect(!auth.ok && auth.error).toBeInstanceOf(AuthFailure);
    expect(!auth.ok && auth.error.message).toBe('Token expired');
    expect(!conflict.ok && conflict.error).toBeInstanceOf(SyncConflict);
    expect(!conflict.ok && conflict.error.message).toBe('Phone already registered');
    expect(!invalid.ok && invalid.error).toBeInstanceOf(ValidationFailure);
    expect(!server.ok && server.error).toBeInstanceOf(ServerFailure);
    expect(!server.ok && server.error.message).toBe('HTTP 503');
  });

  it('rejects a success with an unparseable body', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>', { status: 200 }));

    const result = await createApi(fetchImpl).get('/customers/updates');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ServerFailure);
    expect(result.error.message.startsWith('Invalid JSON response:')).toBe(true);
  });

  it('reports connection errors as network failures', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const result = await createApi(fetchImpl).get('/customers/updates');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NetworkFailure);
    expect(result.error.message).toBe('fetch failed');
  });

  it('gives up after the timeout', async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );

    const result = await createApi(fetchImpl, 10).get('/customers/updates');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NetworkFailure);
    expect(result.error.message).toBe('Request timed out after 10 ms');
  });

  it('turns an outside abort into a cancellation', async () => {
    const controller = new AbortController();
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          controller.abort();
        })
    );

    const result = await createApi(fetchImpl).post('/customers', {}, { signal: controller.signal });

    expect(!result.ok && result.error).toBeInstanceOf(CancelledFailure);
  });

  it('does not call out once already aborted', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const controller = new AbortController();
    controller.abort();

    const result = await createApi(fetchImpl).get('/customers/updates', { signal: controller.signal });

    expect(!result.ok && result.error).toBeInstanceOf(CancelledFailure);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('failureForStatus', () => {
  it('names the path on a 404', () => {
    const failure = failureForStatus(404, null, '/customers/cust-1', null);
    expect(failure).toBeInstanceOf(NotFoundFailure);
    expect(failure.message).toBe('/customers/cust-1 not found');
  });

  it('keeps the status of server faults', () => {
    const failure = failureForStatus(429, 'Slow down', '/customers', null);
    expect(failure).toBeInstanceOf(ServerFailure);
    expect(failure instanceof ServerFailure && failure.statusCode).toBe(429);
  });
});
