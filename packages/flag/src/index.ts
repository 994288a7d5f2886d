export { FlagError, type FlagErrorKind } from './errors'
export { type FlagOptions, readBitmapFile, readFlag, writeBitmapFile, writeFlag } from './flag'
export { formatFlagRecords, parseFlagRecords, toColumnMajor, toRowMajor } from './records'
export { FileFlagStore, locateFlagKey, MemoryFlagStore } from './store'
export * from './types'
