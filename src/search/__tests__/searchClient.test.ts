import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { buildSearchBody, HybridSearchClient } from '../searchClient';
import { ErrorCode, SearchServiceError } from '../../utils/errorHandler';

type Handler = (config: InternalAxiosRequestConfig) => AxiosResponse | AxiosError;

function createAdapter(handler: Handler): { adapter: AxiosAdapter; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async config => {
    requests.push(config);
    const result = handler(config);
    if (result instanceof AxiosError) {
      throw result;
    }
    return result;
  };
  return { adapter, requests };
}

function respond(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

function failWith(status: number, data: unknown): Handler {
  return config =>
    new AxiosError(
      `Request failed with status code ${status}`,
      AxiosError.ERR_BAD_RESPONSE,
      config,
      undefined,
      respond(config, status, data)
    );
}

function createClient(handler: Handler) {
  const { adapter, requests } = createAdapter(handler);
  const client = new HybridSearchClient({
    endpoint: 'https://search.example.test',
    apiKey: 'test-search-key',
    apiVersion: '2023-11-01',
    timeoutMs: 5000,
    adapter,
  });
  return { client, requests };
}

const REQUEST = {
  search: 'member OR history',
  select: ['korean', 'english'],
  top: 5,
  vectorQuery: { vector: [0.1, 0.2], k: 5, fields: 'vector_embedding', exhaustive: false },
};

describe('buildSearchBody', () => {
  it('builds a full-syntax, any-mode hybrid body', () => {
    expect(buildSearchBody(REQUEST)).toEqual({
      search: 'member OR history',
      queryType: 'full',
      searchMode: 'any',
      select: 'korean,english',
      top: 5,
      vectorQueries: [
        { kind: 'vector', vector: [0.1, 0.2], k: 5, fields: 'vector_embedding', exhaustive: false },
      ],
    });
  });

  it('omits the vector query for lexical-only searches', () => {
    const body = buildSearchBody({ search: 'member', select: ['english'], top: 3 });
    expect(body).not.toHaveProperty('vectorQueries');
  });
});

describe('HybridSearchClient', () => {
  it('posts to the index search endpoint with key and api version', async () => {
    const hits = [{ '@search.score': 2.1, korean: '회원', english: 'Member' }];
    const { client, requests } = createClient(config => respond(config, 200, { value: hits }));

    const result = await client.search('dictionary-index', REQUEST);

    expect(result).toEqual(hits);
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('post');
    expect(requests[0].baseURL).toBe('https://search.example.test');
    expect(requests[0].url).toBe('/indexes/dictionary-index/docs/search');
    expect(requests[0].params).toEqual({ 'api-version': '2023-11-01' });
    expect(requests[0].headers.get('api-key')).toBe('test-search-key');
    expect(requests[0].timeout).toBe(5000);
    expect(JSON.parse(requests[0].data)).toEqual(buildSearchBody(REQUEST));
  });

  it('maps a rejected key to an auth error with the service message', async () => {
    const { client } = createClient(failWith(403, { error: { code: 'Forbidden', message: 'Invalid api key' } }));

    const error = await client.search('dictionary-index', REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchServiceError);
    expect(error).toMatchObject({
      message: 'Search API Error 403: Invalid api key',
      code: ErrorCode.AUTH_ERROR,
      statusCode: 403,
    });
  });

  it('maps other status codes to a search failure', async () => {
    const { client } = createClient(failWith(500, 'internal'));

    await expect(client.search('dictionary-index', REQUEST)).rejects.toMatchObject({
      message: 'Search API Error 500: Request failed with status code 500',
      code: ErrorCode.SEARCH_FAILED,
    });
  });

  it('reports timeouts', async () => {
    const { client } = createClient(
      config => new AxiosError('timeout of 5000ms exceeded', AxiosError.ECONNABORTED, config)
    );

    await expect(client.search('dictionary-index', REQUEST)).rejects.toMatchObject({
      message: 'Search request timed out',
      code: ErrorCode.NETWORK_ERROR,
    });
  });

  it('reports an unreachable service', async () => {
    const { client } = createClient(config => new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config));

    await expect(client.search('dictionary-index', REQUEST)).rejects.toThrow(
      'Network error: Unable to reach the search service'
    );
  });

  it('rejects a response without a value array', async () => {
    const { client } = createClient(config => respond(config, 200, { items: [] }));

    await expect(client.search('dictionary-index', REQUEST)).rejects.toThrow(
      'Search API returned an unexpected response shape'
    );
  });
});
