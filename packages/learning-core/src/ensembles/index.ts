// ---------------------------------------------------------------------------
// Tree Ensembles — barrel export
// ---------------------------------------------------------------------------

export { DecisionTree, isLeaf } from './decision-tree.js';
export {
  RandomForest,
  pluralityVote,
  resolveMaxFeatures,
  type ForestMember,
} from './random-forest.js';
