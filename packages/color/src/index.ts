export * from './convert'
export * from './rgb24'
export * from './types'
