export * from './bytes'
export * from './errors'
export * from './format'
export * from './logger'
export * from './types'
