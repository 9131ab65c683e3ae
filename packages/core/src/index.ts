export * from './types'
export * from './config'
export * from './lib/technology'
export * from './lib/log'
export * from './lib/fs'
export * from './lib/rule-schema'
export * from './cache/ttl-cache'
export * from './rules/manager'
export * from './deploy/deployer'
export * from './deploy/detect'
