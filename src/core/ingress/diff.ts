/**
 * Set-based comparison of live and desired rule lists.
 *
 * Comparison ignores order and the catch-all. Order is still significant to
 * the tunnel; `planTunnelSync` decides what to do when only order differs.
 *
 * Every rule without a hostname counts as the catch-all unless
 * `strictCatchAll` is set, in which case only the bare 404 rule does.
 */

import { CATCH_ALL_SERVICE, type ComparableRule, type WireRule } from '../types/ingress.js';
import { catchAllRule } from './render.js';

export interface CatchAllOptions {
  /**
   * Treat only the bare `http_status:404` rule as the catch-all. Rules
   * without a hostname (wildcard-host routes) are then diffed and kept.
   * @default false
   */
  strictCatchAll?: boolean;
}

export interface RuleDiff {
  /** Desired rules missing from the live list, in desired order */
  toAdd: WireRule[];
  /** Live rules missing from the desired list, in live order */
  toRemove: ComparableRule[];
}

export function toComparableRule(rule: WireRule): ComparableRule {
  return {
    hostname: rule.hostname ?? '',
    path: rule.path ?? '',
    service: rule.service,
  };
}

export function rulesEqual(a: ComparableRule, b: ComparableRule): boolean {
  return a.hostname === b.hostname && a.path === b.path && a.service === b.service;
}

/**
 * The catch-all marker: a rule without a hostname. Under `strictCatchAll`
 * the path must be empty and the service must be the 404 sentinel as well.
 */
export function isCatchAll(rule: ComparableRule | WireRule, options: CatchAllOptions = {}): boolean {
  if (rule.hostname) {
    return false;
  }
  return !options.strictCatchAll || (!rule.path && rule.service === CATCH_ALL_SERVICE);
}

export function ruleKey(rule: ComparableRule | WireRule): string {
  const comparable = toComparableRule(rule);
  return JSON.stringify([comparable.hostname, comparable.path, comparable.service]);
}

/**
 * A comparable rule back in wire shape, dropping empty fields
 */
export function toWireRule(rule: ComparableRule | WireRule): WireRule {
  const wire: WireRule = { service: rule.service };
  if (rule.hostname) {
    wire.hostname = rule.hostname;
  }
  if (rule.path) {
    wire.path = rule.path;
  }
  return wire;
}

export function diffRules(
  current: readonly WireRule[],
  desired: readonly WireRule[],
  options: CatchAllOptions = {}
): RuleDiff {
  const currentRules = current.filter((rule) => !isCatchAll(rule, options));
  const desiredRules = desired.filter((rule) => !isCatchAll(rule, options));

  const currentKeys = new Set(currentRules.map(ruleKey));
  const desiredKeys = new Set(desiredRules.map(ruleKey));

  return {
    toAdd: desiredRules.filter((rule) => !currentKeys.has(ruleKey(rule))).map(toWireRule),
    toRemove: currentRules.filter((rule) => !desiredKeys.has(ruleKey(rule))).map(toComparableRule),
  };
}

/**
 * Live rules minus `toRemove`, in live order, followed by `toAdd`. The live
 * catch-all is dropped; `ensureCatchAll` puts it back.
 */
export function applyDiff(
  current: readonly WireRule[],
  toAdd: readonly WireRule[],
  toRemove: readonly ComparableRule[],
  options: CatchAllOptions = {}
): WireRule[] {
  const removeKeys = new Set(toRemove.map(ruleKey));

  const kept = current
    .filter((rule) => !isCatchAll(rule, options) && !removeKeys.has(ruleKey(rule)))
    .map(toWireRule);

  return [...kept, ...toAdd.map(toWireRule)];
}

/**
 * Strip every catch-all and append exactly one at the end. Idempotent.
 */
export function ensureCatchAll(rules: readonly WireRule[], options: CatchAllOptions = {}): WireRule[] {
  return [...rules.filter((rule) => !isCatchAll(rule, options)).map(toWireRule), catchAllRule()];
}
