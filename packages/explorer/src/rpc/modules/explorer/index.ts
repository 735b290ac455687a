export { createExplorerRpcMethods } from './explorer'
export * from './schema'
