export * from './bmp'
