export * from './git-forge'
export * from './history'
export * from './release'
