/**
 * Pattern Matching Utilities
 *
 * Matchers used by the enforcement engine to compare request values
 * (domain, object, action) against policy values.
 */

import type { MatcherKind } from '../types';

const keyMatchCache = new Map<string, RegExp>();
const KEY_MATCH_CACHE_LIMIT = 1024;

/**
 * Glob-style key matching.
 *
 * - `*` in the pattern matches any run of characters, including `/` and `:`
 * - every other character matches itself
 *
 * @example
 * keyMatch('/users/42', '/users/*')  // true
 * keyMatch('users', '*')             // true
 * keyMatch('users', 'user')          // false
 */
export function keyMatch(key: string, pattern: string): boolean {
  if (pattern === key || pattern === '*') return true;
  if (!pattern.includes('*')) return false;

  let regex = keyMatchCache.get(pattern);
  if (!regex) {
    const source = pattern
      .split('*')
      .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    regex = new RegExp(`^${source}$`);
    if (keyMatchCache.size >= KEY_MATCH_CACHE_LIMIT) {
      keyMatchCache.clear();
    }
    keyMatchCache.set(pattern, regex);
  }
  return regex.test(key);
}

/**
 * Matches a value against a pattern with `:`-delimited segment wildcards.
 *
 * Wildcard Specification:
 * - `prefix:*` matches any value starting with `prefix:` (greedy - matches all remaining segments)
 * - `*:suffix` matches any value ending with `:suffix`
 * - `prefix:*:suffix` matches values with prefix and suffix (middle * matches single segment)
 * - `*` alone matches any value
 * - `*:*` matches any value with exactly two segments
 */
export function segmentMatch(value: string, pattern: string): boolean {
  if (pattern === value) return true;
  if (pattern === '*') return true;

  const patternParts = pattern.split(':');
  const valueParts = value.split(':');

  const hasTrailingWildcard = patternParts[patternParts.length - 1] === '*';

  if (hasTrailingWildcard && patternParts.length <= valueParts.length) {
    for (let i = 0; i < patternParts.length - 1; i++) {
      if (!segmentMatches(patternParts[i], valueParts[i])) {
        return false;
      }
    }

    // Trailing wildcard needs at least one non-empty remaining segment
    const remainingParts = valueParts.slice(patternParts.length - 1);
    return remainingParts.some(part => part !== '');
  }

  if (patternParts.length !== valueParts.length) {
    return false;
  }

  for (let i = 0; i < patternParts.length; i++) {
    if (!segmentMatches(patternParts[i], valueParts[i])) {
      return false;
    }
  }

  return true;
}

function segmentMatches(patternPart: string | undefined, valuePart: string | undefined): boolean {
  if (patternPart === undefined || valuePart === undefined) return false;
  // Wildcard matches any non-empty segment
  if (patternPart === '*') return valuePart !== '';
  return patternPart === valuePart;
}

export function exactMatch(value: string, pattern: string): boolean {
  return value === pattern;
}

export type Matcher = (value: string, pattern: string) => boolean;

export function getMatcher(kind: MatcherKind): Matcher {
  switch (kind) {
    case 'keyMatch':
      return keyMatch;
    case 'segment':
      return segmentMatch;
    case 'exact':
      return exactMatch;
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unsupported matcher: ${String(unknownKind)}`);
    }
  }
}
