// Pure HTTP utility functions
// All functions are pure - no side effects

import { err, ok, type Result } from 'neverthrow';

import { MalformedTargetError } from '../types.js';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Parse an absolute http(s) URL.
 */
export const parseAbsoluteTarget = (target: string): Result<URL, MalformedTargetError> => {
  let url: URL;
  try {
    url = new URL(target);
  } catch (error) {
    return err(new MalformedTargetError(target, error));
  }
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    return err(new MalformedTargetError(target, new Error(`unsupported protocol ${url.protocol}`)));
  }
  return ok(url);
};

/**
 * A path-only target ("/greeting", "/items?page=2") that needs a base URL.
 */
export const isPathTarget = (target: string): boolean => target.startsWith('/') && !target.startsWith('//');

/**
 * Resolve a descriptor target against an optional base URL.
 * Absolute targets ignore the base; path targets are appended to the base path.
 */
export const resolveTarget = (baseUrl: string | undefined, target: string): Result<URL, MalformedTargetError> => {
  if (!isPathTarget(target)) {
    return parseAbsoluteTarget(target);
  }
  if (!baseUrl) {
    return err(new MalformedTargetError(target, new Error('relative target without a base URL')));
  }

  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  return parseAbsoluteTarget(`${cleanBaseUrl}${target}`);
};

/**
 * Sanitize URL for logging (remove sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password', 'access_token'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }
    if (urlObj.password) {
      urlObj.password = '***';
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;
