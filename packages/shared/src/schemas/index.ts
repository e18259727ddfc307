export {
  criterionSchema,
  decisionTreeOptionsSchema,
  randomStateSchema,
  type Criterion,
  type DecisionTreeOptions,
  type DecisionTreeOptionsInput,
} from './decision-tree.js'

export {
  maxFeaturesSchema,
  randomForestOptionsSchema,
  type MaxFeatures,
  type RandomForestOptions,
  type RandomForestOptionsInput,
} from './random-forest.js'

export {
  kMeansOptionsSchema,
  type KMeansOptions,
  type KMeansOptionsInput,
} from './kmeans.js'
