/**
 * Unit tests for web-fetch.ts
 *
 * axios is fully mocked; no network calls are made.
 */

import {
  fetchImage,
  formatCookieHeader,
  generateUserAgent,
  getCookies,
  parseSetCookie,
} from '../web-fetch';

jest.mock('axios');
import axios from 'axios';
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('generateUserAgent', () => {
  it('builds the lowest choice of every part when random() is 0', () => {
    expect(generateUserAgent(() => 0)).toBe(
      'Mozilla/5.0 (Windows NT; AAAAAAAAAA) AppleWebKit/537.36 (KHTML, like Gecko) AAAAA/1.0.1000 Safari/537.36 en-US'
    );
  });

  it('builds the highest choice of every part when random() is just below 1', () => {
    expect(generateUserAgent(() => 0.999999)).toBe(
      'Mozilla/5.0 (Linux; 9999999999) AppleWebKit/537.36 (KHTML, like Gecko) ZZZZZ/20.9.9999 Safari/537.36 de-DE'
    );
  });

  it('follows the expected shape with the default random source', () => {
    expect(generateUserAgent()).toMatch(
      /^Mozilla\/5\.0 \((Windows NT|Macintosh|X11|Linux); [A-Za-z0-9]{10}\) AppleWebKit\/537\.36 \(KHTML, like Gecko\) [A-Z]{5}\/\d{1,2}\.\d\.\d{4} Safari\/537\.36 (en-US|en-GB|es-ES|fr-FR|de-DE)$/
    );
  });
});

describe('parseSetCookie', () => {
  it('keeps the name=value pair of each header line', () => {
    expect(parseSetCookie(['sid=abc123; Path=/; HttpOnly', 'geo=ES'])).toEqual({ sid: 'abc123', geo: 'ES' });
  });

  it('accepts a single string and ignores malformed lines', () => {
    expect(parseSetCookie('consent=yes; Secure')).toEqual({ consent: 'yes' });
    expect(parseSetCookie(['=orphan', 'novalue'])).toEqual({});
    expect(parseSetCookie(undefined)).toEqual({});
  });
});

describe('formatCookieHeader', () => {
  it('joins cookies into a Cookie header', () => {
    expect(formatCookieHeader({ sid: 'abc123', geo: 'ES' })).toBe('sid=abc123; geo=ES');
  });
});

describe('getCookies', () => {
  it('returns the cookies the shop sets', async () => {
    mockedAxios.get.mockResolvedValueOnce({
      data: '<html></html>',
      headers: { 'set-cookie': ['session=s-1; Path=/', 'locale=es'] },
    });

    await expect(getCookies('https://shop.test/')).resolves.toEqual({ session: 's-1', locale: 'es' });

    const [url, options] = mockedAxios.get.mock.calls[0];
    expect(url).toBe('https://shop.test/');
    expect(options?.headers?.['User-Agent']).toMatch(/^Mozilla\/5\.0 /);
  });
});

describe('fetchImage', () => {
  beforeEach(() => mockedAxios.get.mockReset());

  it('downloads the image as base64 and sends the cookies along', async () => {
    mockedAxios.get.mockResolvedValueOnce({
      data: Buffer.from('png-bytes'),
      headers: { 'content-type': 'image/png; charset=binary' },
    });

    const image = await fetchImage({ url: 'https://cdn.shop.test/a.png', cookies: { session: 's-1' } });

    expect(image).toEqual({
      base64: Buffer.from('png-bytes').toString('base64'),
      contentType: 'image/png',
    });
    const options = mockedAxios.get.mock.calls[0][1];
    expect(options?.responseType).toBe('arraybuffer');
    expect(options?.headers?.Cookie).toBe('session=s-1');
  });

  it('defaults the content type to JPEG and omits an empty cookie jar', async () => {
    mockedAxios.get.mockResolvedValueOnce({ data: Buffer.from('jpg'), headers: {} });

    const image = await fetchImage({ url: 'https://cdn.shop.test/b', cookies: {} });

    expect(image.contentType).toBe('image/jpeg');
    expect(mockedAxios.get.mock.calls[0][1]?.headers?.Cookie).toBeUndefined();
  });

  it('propagates HTTP failures to the caller', async () => {
    mockedAxios.get.mockRejectedValueOnce(new Error('Request failed with status code 403'));
    await expect(fetchImage({ url: 'https://cdn.shop.test/c.jpg' })).rejects.toThrow('403');
  });
});
