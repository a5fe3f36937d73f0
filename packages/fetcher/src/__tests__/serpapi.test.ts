import { describe, it, expect, vi } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosInstance, type AxiosResponse } from 'axios';
import { createSerpApiFetcher, SERP_ENDPOINT } from '../serpapi.js';

function createMockClient(get: ReturnType<typeof vi.fn>) {
  return { get } as unknown as AxiosInstance;
}

function httpError(status: number, data: unknown): AxiosError {
  const response: AxiosResponse = {
    data,
    status,
    statusText: 'Error',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, response);
}

const options = { apiKey: 'test-key', hl: 'en', gl: 'us' };

describe('createSerpApiFetcher', () => {
  it('should query SerpAPI with the theater and locale', async () => {
    const get = vi.fn().mockResolvedValue({ data: { showtimes: [] } });
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    await fetcher.fetchTheater({ name: 'Grand Lake Theater', location: 'Oakland, California' });

    expect(get).toHaveBeenCalledWith(SERP_ENDPOINT, {
      params: {
        q: 'Grand Lake Theater',
        location: 'Oakland, California',
        hl: 'en',
        gl: 'us',
        api_key: 'test-key',
      },
      signal: undefined,
    });
  });

  it('should omit location when the theater has none', async () => {
    const get = vi.fn().mockResolvedValue({ data: { showtimes: [] } });
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    await fetcher.fetchTheater({ name: 'Roxie' });

    expect(get.mock.calls[0]?.[1]).toEqual({
      params: { q: 'Roxie', hl: 'en', gl: 'us', api_key: 'test-key' },
      signal: undefined,
    });
  });

  it('should pass the abort signal to the request', async () => {
    const get = vi.fn().mockResolvedValue({ data: {} });
    const controller = new AbortController();
    const fetcher = createSerpApiFetcher({ ...options, signal: controller.signal }, createMockClient(get));

    await fetcher.fetchTheater({ name: 'Roxie' });

    expect(get.mock.calls[0]?.[1]).toMatchObject({ signal: controller.signal });
  });

  it('should return normalized showtimes on success', async () => {
    const get = vi.fn().mockResolvedValue({
      data: {
        showtimes: [
          {
            address: '3117 16th St, San Francisco, CA',
            movies: [{ name: 'Night Train', showing: [{ time: ['7:00pm'], type: 'Standard' }] }],
          },
        ],
      },
    });
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Roxie' });

    expect(result).toEqual({
      ok: true,
      value: {
        address: '3117 16th St, San Francisco, CA',
        movies: [{ title: 'Night Train', rating: null, formats: [], showtimes: ['7:00pm (Standard)'] }],
      },
    });
  });

  it('should map an error field in the payload to api_error', async () => {
    const get = vi.fn().mockResolvedValue({ data: { error: "Google hasn't returned any results for this query." } });
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Nowhere Cinema' });

    expect(result).toEqual({
      ok: false,
      error: { type: 'api_error', message: "Google hasn't returned any results for this query." },
    });
  });

  it('should map HTTP failures to http_error with the API message', async () => {
    const get = vi.fn().mockRejectedValue(httpError(401, { error: 'Invalid API key.' }));
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Roxie' });

    expect(result).toEqual({
      ok: false,
      error: { type: 'http_error', status: 401, message: 'Invalid API key.' },
    });
  });

  it('should fall back to the axios message when the body has no error', async () => {
    const get = vi.fn().mockRejectedValue(httpError(503, '<html>unavailable</html>'));
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Roxie' });

    expect(result).toEqual({
      ok: false,
      error: { type: 'http_error', status: 503, message: 'Request failed with status code 503' },
    });
  });

  it('should map transport failures to network_error', async () => {
    const get = vi.fn().mockRejectedValue(new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED'));
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Roxie' });

    expect(result).toEqual({
      ok: false,
      error: { type: 'network_error', message: 'timeout of 15000ms exceeded' },
    });
  });

  it('should map other failures to unexpected', async () => {
    const get = vi.fn().mockRejectedValue(new TypeError('boom'));
    const fetcher = createSerpApiFetcher(options, createMockClient(get));

    const result = await fetcher.fetchTheater({ name: 'Roxie' });

    expect(result).toEqual({ ok: false, error: { type: 'unexpected', message: 'boom' } });
  });
});
