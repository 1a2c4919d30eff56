export * from './queueItem.js'
export * from './queueKeys.js'
export * from './sourceTypes.js'
