export * from './types/domain'
export * from './config'
export * from './api/splitErrors'
export * from './api/splitPayload'
export * from './api/httpSplitBackend'
export * from './utils/money'
export * from './utils/itemKeys'
export * from './utils/participants'
export * from './utils/assignments'
export * from './utils/splitCalculator'
export * from './utils/shareText'
export * from './utils/limit'
export * from './state/splitEvents'
export * from './state/splitCache'
export * from './state/splitSession'
export * from './hooks/useSplitSession'
export * from './engine'
