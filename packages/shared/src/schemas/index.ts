export {
  treeNodeSchema,
  decisionTreeRequestSchema,
  type TreeNodeRequest,
  type DecisionTreeRequest,
} from './decision-tree'

export {
  optionPricingRequestSchema,
  convergenceRequestSchema,
  type OptionPricingRequest,
  type ConvergenceRequest,
} from './option-pricing'

export { realOptionRequestSchema, type RealOptionRequest } from './real-options'
