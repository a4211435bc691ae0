import { z } from 'zod'

const marketFields = {
  V: z.number({ required_error: "Real options require 'V' (project value)" }).finite(),
  r: z.number().finite().default(0.05),
  sigma: z.number().finite().default(0.3),
  T: z.number().finite().default(1),
  q: z.number().finite().default(0),
}

export const realOptionRequestSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('delay'),
    ...marketFields,
    I: z.number({ required_error: "Option to delay requires 'I' (investment cost)" }).finite(),
  }),
  z.object({
    kind: z.literal('expand'),
    ...marketFields,
    expansionCost: z.number().finite(),
    expansionFactor: z.number().finite(),
  }),
  z.object({
    kind: z.literal('abandon'),
    ...marketFields,
    salvageValue: z.number().finite(),
  }),
])

export type RealOptionRequest = z.infer<typeof realOptionRequestSchema>
