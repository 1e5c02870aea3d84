import fs from 'node:fs';
import path from 'node:path';
import nock from 'nock';
import { FatalApiError, TransientApiError } from '../../utils/errors';
import { BearerAuthenticator } from '../auth';
import { HttpPageTransport } from '../http-transport';

const BASE_URL = 'https://api.example.com';
const URL = `${BASE_URL}/users`;
const QUERY = {
  $method: 'find' as const,
  params: { query: { $limit: 2, $sort: { _id: 1 as const } } }
};

function readFixture(filename: string): string {
  const fullPath = path.resolve(__dirname, '../../..', 'tests/__fixtures__', filename);
  return fs.readFileSync(fullPath, 'utf-8');
}

function buildTransport(): HttpPageTransport {
  return new HttpPageTransport({
    authenticator: new BearerAuthenticator('test-secret'),
    timeoutMs: 10000
  });
}

describe('HttpPageTransport', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should post the query with auth and JSON headers and return the raw body', async () => {
    const page = readFixture('users-page.json');
    const scope = nock(BASE_URL)
      .post('/users', QUERY)
      .matchHeader('authorization', 'Bearer test-secret')
      .matchHeader('content-type', /application\/json/)
      .matchHeader('accept', /application\/json/)
      .reply(200, page, { 'Content-Type': 'application/json' });

    const response = await buildTransport().post(URL, QUERY);

    expect(response.status).toBe(200);
    expect(response.body).toBe(page);
    expect(response.headers['content-type']).toBe('application/json');
    expect(scope.isDone()).toBe(true);
  });

  it('should resolve error statuses with lowercased headers', async () => {
    nock(BASE_URL).post('/users').reply(429, 'slow down', { 'Retry-After': '30' });

    const response = await buildTransport().post(URL, QUERY);

    expect(response).toMatchObject({ status: 429, body: 'slow down' });
    expect(response.headers['retry-after']).toBe('30');
  });

  it('should map connection resets to a transient error', async () => {
    nock(BASE_URL).post('/users').replyWithError({ message: 'socket hang up', code: 'ECONNRESET' });

    const request = buildTransport().post(URL, QUERY);

    await expect(request).rejects.toBeInstanceOf(TransientApiError);
    await expect(request).rejects.toMatchObject({ code: 'ECONNRESET', url: URL });
  });

  it('should map other transport failures to a fatal error', async () => {
    nock(BASE_URL).post('/users').replyWithError({ message: 'certificate rejected', code: 'CERT_HAS_EXPIRED' });

    await expect(buildTransport().post(URL, QUERY)).rejects.toBeInstanceOf(FatalApiError);
  });
});
