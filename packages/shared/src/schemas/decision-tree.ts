import { z } from 'zod'

/** Tree node as sent by callers; `type` is free text so unknown kinds reach the engine's fallback. */
export interface TreeNodeRequest {
  name: string
  type?: string
  cost?: number
  probability?: number
  payoff?: number
  children?: TreeNodeRequest[]
}

export const treeNodeSchema: z.ZodType<TreeNodeRequest> = z.lazy(() =>
  z.object({
    name: z.string().min(1, 'Node name is required'),
    type: z.string().min(1).optional(),
    cost: z.number().finite().optional(),
    probability: z.number().min(0).max(1).optional(),
    payoff: z.number().finite().optional(),
    children: z.array(treeNodeSchema).optional(),
  }),
)

export const decisionTreeRequestSchema = z.object({
  tree: treeNodeSchema,
  missingProbabilities: z.enum(['uniform', 'reject']).optional(),
})

export type DecisionTreeRequest = z.infer<typeof decisionTreeRequestSchema>
