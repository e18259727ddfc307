import { z } from 'zod'

export const criterionSchema = z.enum(['entropy', 'gini'])

/** PRNG seed. The generator keeps 32 bits, so wider values are rejected. */
export const randomStateSchema = z
  .number()
  .int()
  .min(-(2 ** 31))
  .max(2 ** 31 - 1)

export const decisionTreeOptionsSchema = z.object({
  maxDepth: z.number().int().min(0).default(10),
  minSamplesSplit: z.number().int().min(1).default(2),
  minSamplesLeaf: z.number().int().min(1).default(1),
  criterion: criterionSchema.default('entropy'),
  /** Features drawn per node. Omit to search every feature. */
  maxFeatures: z.number().int().min(1).optional(),
  randomState: randomStateSchema.optional(),
})

export type Criterion = z.infer<typeof criterionSchema>
export type DecisionTreeOptionsInput = z.input<typeof decisionTreeOptionsSchema>
export type DecisionTreeOptions = z.output<typeof decisionTreeOptionsSchema>
