import { z } from 'zod'
import { randomStateSchema } from './decision-tree.js'

export const kMeansOptionsSchema = z.object({
  nClusters: z.number().int().min(1).default(3),
  maxIters: z.number().int().min(1).default(100),
  randomState: randomStateSchema.optional(),
})

export type KMeansOptionsInput = z.input<typeof kMeansOptionsSchema>
export type KMeansOptions = z.output<typeof kMeansOptionsSchema>
