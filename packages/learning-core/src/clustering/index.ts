// ---------------------------------------------------------------------------
// Clustering — barrel export
// ---------------------------------------------------------------------------

export { KMeans } from './kmeans.js';
