// ---------------------------------------------------------------------------
// Impurity measures — barrel export
// ---------------------------------------------------------------------------

export {
  LOG_EPSILON,
  entropy,
  entropyFromCounts,
  gini,
  giniFromCounts,
  impurity,
  impurityFromCounts,
  informationGain,
  splitGain,
} from './impurity.js';
