/**
 * Shop-facing HTTP helpers: cookie harvesting, randomized user agents and
 * image download for the image embedding calls.
 */

import axios from 'axios';
import { ImageRef } from '../types';

const PLATFORMS = ['Windows NT', 'Macintosh', 'X11', 'Linux'];
const LANGUAGES = ['en-US', 'en-GB', 'es-ES', 'fr-FR', 'de-DE'];
const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const ALPHANUMERIC = `${UPPERCASE}abcdefghijklmnopqrstuvwxyz0123456789`;

const DEFAULT_TIMEOUT_MS = 15_000;

export interface FetchedImage {
  base64: string;
  contentType: string;
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function randomString(random: () => number, alphabet: string, length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet[randomInt(random, 0, alphabet.length - 1)];
  }
  return out;
}

function pick<T>(random: () => number, values: readonly T[]): T {
  return values[randomInt(random, 0, values.length - 1)];
}

/**
 * Random, plausible-looking user agent so repeated catalog requests do not
 * share one fingerprint.
 */
export function generateUserAgent(random: () => number = Math.random): string {
  const browser = randomString(random, UPPERCASE, 5);
  const version = `${randomInt(random, 1, 20)}.${randomInt(random, 0, 9)}.${randomInt(random, 1000, 9999)}`;
  const platform = pick(random, PLATFORMS);
  const language = pick(random, LANGUAGES);
  const token = randomString(random, ALPHANUMERIC, 10);

  return `Mozilla/5.0 (${platform}; ${token}) AppleWebKit/537.36 (KHTML, like Gecko) ${browser}/${version} Safari/537.36 ${language}`;
}

export function parseSetCookie(headerValue: unknown): Record<string, string> {
  const lines = Array.isArray(headerValue)
    ? headerValue.filter((line): line is string => typeof line === 'string')
    : typeof headerValue === 'string'
      ? [headerValue]
      : [];

  const cookies: Record<string, string> = {};
  for (const line of lines) {
    const pair = line.split(';')[0];
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

export function formatCookieHeader(cookies: Record<string, string>): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

/**
 * Visit a shop page once and keep the cookies it sets. Some shops only serve
 * product images to clients that carry them.
 */
export async function getCookies(
  url: string,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<Record<string, string>> {
  const response = await axios.get(url, {
    headers: { 'User-Agent': generateUserAgent() },
    timeout: timeoutMs,
  });
  return parseSetCookie(response.headers['set-cookie']);
}

export async function fetchImage(
  ref: ImageRef,
  timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<FetchedImage> {
  const headers: Record<string, string> = { 'User-Agent': generateUserAgent() };
  if (ref.cookies && Object.keys(ref.cookies).length > 0) {
    headers.Cookie = formatCookieHeader(ref.cookies);
  }

  const response = await axios.get<ArrayBuffer>(ref.url, {
    headers,
    responseType: 'arraybuffer',
    timeout: timeoutMs,
  });

  const contentType = response.headers['content-type'];
  return {
    base64: Buffer.from(response.data).toString('base64'),
    contentType: typeof contentType === 'string' ? contentType.split(';')[0].trim() : 'image/jpeg',
  };
}
