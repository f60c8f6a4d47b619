// Public barrel for @cache-reconcile/loaders
//   import * as Loaders from '@cache-reconcile/loaders'
//   Loaders.CacheFirst.make(...) / Loaders.State.networkFirst(...) / ...

// Collaborators and policies
export * as Sources from './Sources.js'
export { CacheWriter, Connectivity, LocalSource, ObservableLocalSource, RemoteSource } from './Sources.js'
export * as Policy from './Policy.js'

// Loaders: raw value streams
export * as CacheFirst from './CacheFirst.js'
export * as CacheFirstReactive from './CacheFirstReactive.js'
export * as NetworkFirst from './NetworkFirst.js'

// State: ResultState streams
export * as ResultState from './ResultState.js'
export * as State from './State.js'
export * as NetworkFirstReactive from './NetworkFirstReactive.js'

// Errors
export * as InitialLoadError from './InitialLoadError.js'
export { NetworkUnavailable, RemoteEmpty, RemoteFailed } from './InitialLoadError.js'

// Config & diagnostics
export { LoaderConfig, LoaderConfigTag } from './LoaderConfig.js'
export type { LoaderConfigShape, LoaderConfigSnapshot } from './LoaderConfig.js'
export * as RequestContext from './RequestContext.js'
export * as Diagnostics from './Diagnostics.js'
