/**
 * Turning freshly built rules into the list submitted to the tunnel
 */

import { DEFAULT_INGRESS_CONFIG, type SyncStrategy } from '../config/index.js';
import { IngressRuleLimitError } from '../errors.js';
import { getComponentLogger, type IngressLogger } from '../logging/index.js';
import type { ComparableRule, WireRule } from '../types/ingress.js';
import { applyDiff, type CatchAllOptions, diffRules, ensureCatchAll, isCatchAll, ruleKey } from './diff.js';
import { compareWireRules } from './sort.js';

const NO_LIST = -1;

/**
 * Merge the rule lists of several builds (HTTPRoute and GRPCRoute) into one
 * list terminated by a single catch-all.
 *
 * Each list is already in routing order and keeps its internal order; the
 * lists are interleaved by comparing their heads, with ties going to the
 * earlier list. Merging a single list returns it unchanged.
 */
export function mergeRouteRules(
  ruleLists: readonly (readonly WireRule[])[],
  options: CatchAllOptions = {}
): WireRule[] {
  const queues = ruleLists.map((rules) => rules.filter((rule) => !isCatchAll(rule, options)));
  const cursors = queues.map(() => 0);
  const merged: WireRule[] = [];

  for (;;) {
    let pick = NO_LIST;
    let head: WireRule | undefined;

    for (let idx = 0; idx < queues.length; idx++) {
      const candidate = queues[idx]?.[cursors[idx] ?? 0];
      if (candidate !== undefined && (head === undefined || compareWireRules(candidate, head) < 0)) {
        pick = idx;
        head = candidate;
      }
    }

    if (head === undefined || pick === NO_LIST) {
      break;
    }
    merged.push(head);
    cursors[pick] = (cursors[pick] ?? 0) + 1;
  }

  return ensureCatchAll(merged, options);
}

export interface TunnelSyncInput extends CatchAllOptions {
  /** Rules currently live on the tunnel */
  current: readonly WireRule[];
  /** Freshly built rules, e.g. from `mergeRouteRules` */
  desired: readonly WireRule[];
  strategy?: SyncStrategy;
  maxIngressRules?: number;
  logger?: IngressLogger;
}

export interface TunnelSyncPlan {
  /** Rules to submit, ending with the catch-all */
  rules: WireRule[];
  toAdd: WireRule[];
  toRemove: ComparableRule[];
  /** Same rules on both sides but a different sequence */
  orderChanged: boolean;
  /** Whether `rules` is the desired list rather than a patched live list */
  replaced: boolean;
}

function sameSequence(a: readonly WireRule[], b: readonly WireRule[], options: CatchAllOptions): boolean {
  const aKeys = a.filter((rule) => !isCatchAll(rule, options)).map(ruleKey);
  const bKeys = b.filter((rule) => !isCatchAll(rule, options)).map(ruleKey);
  return aKeys.length === bKeys.length && aKeys.every((key, idx) => key === bKeys[idx]);
}

/**
 * Decide what to submit to the tunnel.
 *
 * @throws IngressRuleLimitError when the resulting list exceeds `maxIngressRules`
 */
export function planTunnelSync(input: TunnelSyncInput): TunnelSyncPlan {
  const strategy = input.strategy ?? DEFAULT_INGRESS_CONFIG.syncStrategy;
  const maxIngressRules = input.maxIngressRules ?? DEFAULT_INGRESS_CONFIG.maxIngressRules;
  const logger = input.logger ?? getComponentLogger('tunnel-sync');

  const catchAll: CatchAllOptions = { strictCatchAll: input.strictCatchAll ?? DEFAULT_INGRESS_CONFIG.strictCatchAll };

  const { toAdd, toRemove } = diffRules(input.current, input.desired, catchAll);
  const membershipChanged = toAdd.length > 0 || toRemove.length > 0;
  const orderChanged = !membershipChanged && !sameSequence(input.current, input.desired, catchAll);

  const replaced = strategy === 'replace-on-change' && (membershipChanged || orderChanged);
  const rules = replaced
    ? ensureCatchAll(input.desired, catchAll)
    : ensureCatchAll(applyDiff(input.current, toAdd, toRemove, catchAll), catchAll);

  if (orderChanged && !replaced) {
    logger.warn('live ingress rule order differs from desired order and is left unchanged', {
      strategy,
      rules: rules.length,
    });
  }

  logger.info('computed ingress rule diff', {
    strategy,
    toAdd: toAdd.length,
    toRemove: toRemove.length,
    orderChanged,
    replaced,
  });

  if (rules.length > maxIngressRules) {
    logger.error('ingress rules limit exceeded', undefined, {
      count: rules.length,
      max: maxIngressRules,
    });
    throw new IngressRuleLimitError(rules.length, maxIngressRules);
  }

  return { rules, toAdd, toRemove, orderChanged, replaced };
}
