import {
  CATCH_ALL_SERVICE,
  PathPriority,
  type RoutingEntry,
  WILDCARD_HOSTNAME,
  type WireRule,
} from '../types/ingress.js';

/**
 * The terminal rule answering every unmatched request with 404
 */
export function catchAllRule(): WireRule {
  return { service: CATCH_ALL_SERVICE };
}

/**
 * Render one entry. The wildcard hostname is omitted rather than sent as `*`,
 * which the remote API rejects when other rules follow. The root path is
 * omitted too, and prefix paths get a trailing `*`.
 */
export function renderRule(entry: RoutingEntry): WireRule {
  const rule: WireRule = { service: entry.service };

  if (entry.hostname !== '' && entry.hostname !== WILDCARD_HOSTNAME) {
    rule.hostname = entry.hostname;
  }

  if (entry.path !== '' && entry.path !== '/') {
    rule.path = entry.priority === PathPriority.Prefix ? `${entry.path}*` : entry.path;
  }

  return rule;
}

/**
 * Render already sorted entries, ending with the catch-all when requested
 */
export function renderRules(entries: readonly RoutingEntry[], addCatchAll: boolean): WireRule[] {
  const rules = entries.map(renderRule);

  if (addCatchAll) {
    rules.push(catchAllRule());
  }

  return rules;
}
