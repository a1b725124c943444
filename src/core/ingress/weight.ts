import { DEFAULT_BACKEND_WEIGHT } from './constants.js';

export interface WeightedRef {
  weight?: number;
}

/**
 * Returned by `selectHighestWeightIndex` when no candidate is eligible
 */
export const NO_BACKEND_SELECTED = -1;

/**
 * Pick the backend that receives all traffic for a rule.
 *
 * Unset weights count as 1 and a weight of 0 disables the candidate. The
 * strictly highest weight wins and ties go to the earliest candidate.
 * Returns `NO_BACKEND_SELECTED` for an empty list or when every candidate is
 * disabled; callers then produce no rule at all.
 */
export function selectHighestWeightIndex(refs: readonly WeightedRef[]): number {
  let selectedIdx = NO_BACKEND_SELECTED;
  let highestWeight = 0;

  refs.forEach((ref, idx) => {
    const weight = ref.weight ?? DEFAULT_BACKEND_WEIGHT;
    if (weight === 0) {
      return;
    }

    if (selectedIdx === NO_BACKEND_SELECTED || weight > highestWeight) {
      selectedIdx = idx;
      highestWeight = weight;
    }
  });

  return selectedIdx;
}
