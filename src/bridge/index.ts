export { UsageError, type UsageErrorCode } from './errors.js'
export {
  delegateToExecutor,
  proxyPropertyDirectly,
  type DelegationOwner,
  type Dispatched,
  type MethodKeys,
  type Passthrough,
} from './delegate.js'
export { PendingResult, type PendingResultOptions } from './result.js'
