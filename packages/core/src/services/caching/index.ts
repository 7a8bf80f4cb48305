/**
 * Caching services for the text matcher
 *
 * Each TextMatcher owns its own caches, so isolated instances never share
 * memoized results.
 */

export { MatchCache } from './MatchCache.js';
