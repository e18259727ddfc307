import { z } from 'zod'
import { criterionSchema, randomStateSchema } from './decision-tree.js'

/**
 * 'sqrt' | 'log2' | 'all', a positive integer count, or a fraction in (0, 1).
 */
export const maxFeaturesSchema = z.union([
  z.enum(['sqrt', 'log2', 'all']),
  z.number().positive().refine((v) => Number.isInteger(v) || v < 1, {
    message: 'Must be an integer count or a fraction between 0 and 1',
  }),
])

export const randomForestOptionsSchema = z.object({
  nEstimators: z.number().int().min(1).default(100),
  maxDepth: z.number().int().min(0).default(10),
  minSamplesSplit: z.number().int().min(1).default(2),
  minSamplesLeaf: z.number().int().min(1).default(1),
  maxFeatures: maxFeaturesSchema.default('sqrt'),
  bootstrap: z.boolean().default(true),
  criterion: criterionSchema.default('entropy'),
  randomState: randomStateSchema.optional(),
})

export type MaxFeatures = z.infer<typeof maxFeaturesSchema>
export type RandomForestOptionsInput = z.input<typeof randomForestOptionsSchema>
export type RandomForestOptions = z.output<typeof randomForestOptionsSchema>
