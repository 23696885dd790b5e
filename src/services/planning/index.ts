export * from './errors'
export * from './interval'
export * from './aggregator'
export * from './selector'
export * from './clipPlanner'
