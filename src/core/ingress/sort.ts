import { PathPriority, type RoutingEntry, WILDCARD_HOSTNAME, type WireRule } from '../types/ingress.js';
import { isCatchAll } from './diff.js';

type SortKey = Pick<RoutingEntry, 'hostname' | 'path' | 'priority'>;

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Total order over routing entries.
 *
 * The tunnel evaluates rules top to bottom and takes the first match, so the
 * most specific rule must come first:
 *
 *  1. wildcard hostname after every specific hostname
 *  2. hostnames ascending
 *  3. Exact before Prefix
 *  4. longer path first
 *  5. path ascending
 */
export function compareRoutingEntries(a: SortKey, b: SortKey): number {
  const aWildcard = a.hostname === WILDCARD_HOSTNAME;
  const bWildcard = b.hostname === WILDCARD_HOSTNAME;
  if (aWildcard !== bWildcard) {
    return aWildcard ? 1 : -1;
  }

  if (a.hostname !== b.hostname) {
    return compareStrings(a.hostname, b.hostname);
  }

  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }

  if (a.path.length !== b.path.length) {
    return b.path.length - a.path.length;
  }

  return compareStrings(a.path, b.path);
}

/**
 * Sorted copy of `entries`
 */
export function sortRoutingEntries(entries: readonly RoutingEntry[]): RoutingEntry[] {
  return [...entries].sort(compareRoutingEntries);
}

/**
 * Recover the sort key of a rendered rule. Rendering drops the wildcard
 * hostname and the root path and marks prefixes with a trailing `*`.
 */
export function wireRuleSortKey(rule: WireRule): SortKey {
  const hostname = rule.hostname ? rule.hostname : WILDCARD_HOSTNAME;
  const path = rule.path ?? '';

  if (path === '') {
    return { hostname, path, priority: PathPriority.Prefix };
  }
  if (path.endsWith('*')) {
    return { hostname, path: path.slice(0, -1), priority: PathPriority.Prefix };
  }
  return { hostname, path, priority: PathPriority.Exact };
}

/**
 * The routing-entry order applied to rendered rules. The bare 404 rule sorts
 * after everything else.
 *
 * Rendering is lossy (an Exact `/` looks like a whole-host prefix), so this
 * order is only an approximation of `compareRoutingEntries` and must not be
 * used to re-sort a list that is already in routing order.
 */
export function compareWireRules(a: WireRule, b: WireRule): number {
  const aCatchAll = isCatchAll(a, { strictCatchAll: true });
  const bCatchAll = isCatchAll(b, { strictCatchAll: true });
  if (aCatchAll !== bCatchAll) {
    return aCatchAll ? 1 : -1;
  }
  return compareRoutingEntries(wireRuleSortKey(a), wireRuleSortKey(b));
}

