export * from './provider.js'
export * from './search.js'
export * from './tool.js'
