import { z } from 'zod'

const optionType = z.string().toLowerCase().pipe(z.enum(['call', 'put']))

/** Market and contract fields shared by every option request. */
const contractFields = {
  optionType: optionType.default('call'),
  S: z.number({ required_error: "Option pricing requires 'S' (asset value)" }).finite(),
  K: z.number({ required_error: "Option pricing requires 'K' (strike)" }).finite(),
  r: z.number().finite().default(0.05),
  sigma: z.number().finite().default(0.3),
  T: z.number().finite().default(1),
  q: z.number().finite().default(0),
}

export const optionPricingRequestSchema = z.object({
  ...contractFields,
  model: z.string().toLowerCase().pipe(z.enum(['black_scholes', 'binomial'])).default('black_scholes'),
  n: z.number().int().positive().default(100),
  american: z.boolean().default(false),
})

export const convergenceRequestSchema = z.object({
  ...contractFields,
  steps: z.array(z.number().int().positive()).min(1).default([10, 50, 100, 500]),
  tolerance: z.number().positive().default(0.01),
  relative: z.boolean().default(false),
})

export type OptionPricingRequest = z.infer<typeof optionPricingRequestSchema>
export type ConvergenceRequest = z.infer<typeof convergenceRequestSchema>
