export * from './bmp'
export * from './png'
export * from './ico'
export { registerBuiltinDecoders } from './register'
