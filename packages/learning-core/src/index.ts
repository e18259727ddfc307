// ---------------------------------------------------------------------------
// @sylva/learning-core — decision trees, random forests, k-means
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Errors + input guards
export * from './errors.js';
export { assertMatrix, assertLabels, assertFeatureCount } from './validation.js';

// Labels + sampling
export { compareLabels, uniqueLabels, countLabels, majorityLabel, accuracy } from './labels.js';
export { bootstrapIndices, sampleFeatureIndices, projectMatrix } from './sampling.js';

// Impurity measures
export * from './information/index.js';

// Tree ensembles
export * from './ensembles/index.js';

// Clustering
export * from './clustering/index.js';
