// Pure media type functions
// Parsing follows RFC 9110 section 8.3.1: type "/" subtype *( OWS ";" OWS parameter )

import { err, ok, type Result } from 'neverthrow';

import { InvalidMediaTypeError } from '../types.js';

import type { MediaType } from './types.js';

const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;

const WILDCARD = '*';

/**
 * Split on ';' outside of quoted strings.
 */
const splitParameters = (value: string): string[] => {
  const parts: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    if (ch === '"') {
      quoted = !quoted;
    } else if (ch === '\\' && quoted && i + 1 < value.length) {
      current += ch + value.charAt(i + 1);
      i++;
      continue;
    } else if (ch === ';' && !quoted) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
};

const unquote = (value: string): string =>
  value.length >= 2 && value.startsWith('"') && value.endsWith('"')
    ? value.slice(1, -1).replace(/\\(.)/g, '$1')
    : value;

export const tryParseMediaType = (value: string): Result<MediaType, InvalidMediaTypeError> => {
  const [fullType = '', ...rawParams] = splitParameters(value);
  const trimmed = fullType.trim();
  if (!trimmed) {
    return err(new InvalidMediaTypeError(value, 'empty type'));
  }

  // A lone "*" is a common shorthand for */*
  const normalized = trimmed === WILDCARD ? '*/*' : trimmed;
  const slash = normalized.indexOf('/');
  if (slash === -1) {
    return err(new InvalidMediaTypeError(value, "missing '/'"));
  }

  const type = normalized.slice(0, slash).toLowerCase();
  const subtype = normalized.slice(slash + 1).toLowerCase();
  if (!TOKEN_RE.test(type) || !TOKEN_RE.test(subtype)) {
    return err(new InvalidMediaTypeError(value, 'type and subtype must be tokens'));
  }
  if (type === WILDCARD && subtype !== WILDCARD) {
    return err(new InvalidMediaTypeError(value, "wildcard type requires wildcard subtype"));
  }

  const parameters: Record<string, string> = {};
  for (const raw of rawParams) {
    const param = raw.trim();
    if (!param) continue;

    const eq = param.indexOf('=');
    if (eq <= 0) {
      return err(new InvalidMediaTypeError(value, `parameter ${JSON.stringify(param)} has no value`));
    }
    const name = param.slice(0, eq).trim().toLowerCase();
    if (!TOKEN_RE.test(name)) {
      return err(new InvalidMediaTypeError(value, `parameter name ${JSON.stringify(name)} is not a token`));
    }
    const paramValue = unquote(param.slice(eq + 1).trim());
    parameters[name] = name === 'charset' ? paramValue.toLowerCase() : paramValue;
  }

  return ok({ type, subtype, parameters });
};

/**
 * Parse a media type, throwing InvalidMediaTypeError on malformed input.
 * Meant for literals; use tryParseMediaType for values read off the wire.
 */
export const parseMediaType = (value: string): MediaType => {
  const result = tryParseMediaType(value);
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
};

export const toMediaType = (value: MediaType | string): MediaType =>
  typeof value === 'string' ? parseMediaType(value) : value;

const needsQuoting = (value: string): boolean => !TOKEN_RE.test(value);

export const formatMediaType = (mediaType: MediaType): string => {
  const params = Object.entries(mediaType.parameters).map(([name, value]) =>
    needsQuoting(value) ? `${name}="${value.replace(/(["\\])/g, '\\$1')}"` : `${name}=${value}`
  );
  return [`${mediaType.type}/${mediaType.subtype}`, ...params].join(';');
};

export const withParameter = (mediaType: MediaType, name: string, value: string): MediaType => ({
  ...mediaType,
  parameters: { ...mediaType.parameters, [name.toLowerCase()]: value },
});

export const charsetOf = (mediaType: MediaType): string | undefined => mediaType.parameters['charset'];

export const isWildcardType = (mediaType: MediaType): boolean => mediaType.type === WILDCARD;

/**
 * True for "*" and for suffix wildcards such as "*+json".
 */
export const isWildcardSubtype = (mediaType: MediaType): boolean =>
  mediaType.subtype === WILDCARD || mediaType.subtype.startsWith('*+');

/**
 * Structured syntax suffix, e.g. "json" for "application/problem+json".
 */
export const suffixOf = (mediaType: MediaType): string | undefined => {
  const plus = mediaType.subtype.lastIndexOf('+');
  return plus === -1 ? undefined : mediaType.subtype.slice(plus + 1);
};

export const equalsTypeAndSubtype = (a: MediaType, b: MediaType): boolean =>
  a.type === b.type && a.subtype === b.subtype;

const subtypeIncludes = (range: MediaType, other: MediaType): boolean => {
  if (range.subtype === WILDCARD || range.subtype === other.subtype) {
    return true;
  }
  if (range.subtype.startsWith('*+')) {
    const suffix = range.subtype.slice(2);
    // application/*+json covers application/problem+json and application/json itself
    return suffixOf(other) === suffix || other.subtype === suffix;
  }
  return false;
};

/**
 * Whether `range` includes `other`: text/* includes text/plain, but not the other way round.
 * Parameters are ignored.
 */
export const includes = (range: MediaType, other: MediaType): boolean => {
  if (isWildcardType(range)) {
    return true;
  }
  return range.type === other.type && subtypeIncludes(range, other);
};

/**
 * Symmetric variant of includes(): either side may be the wider range.
 */
export const isCompatibleWith = (a: MediaType, b: MediaType): boolean => includes(a, b) || includes(b, a);

export const MediaTypes = {
  ALL: parseMediaType('*/*'),
  APPLICATION_JSON: parseMediaType('application/json'),
  APPLICATION_JSON_SUFFIX: parseMediaType('application/*+json'),
  APPLICATION_NDJSON: parseMediaType('application/x-ndjson'),
  APPLICATION_OCTET_STREAM: parseMediaType('application/octet-stream'),
  APPLICATION_XML: parseMediaType('application/xml'),
  TEXT_ALL: parseMediaType('text/*'),
  TEXT_PLAIN: parseMediaType('text/plain'),
  TEXT_PLAIN_UTF8: parseMediaType('text/plain;charset=utf-8'),
} as const;
