export * from './fixtures.js'
export * from './target-servers.js'
