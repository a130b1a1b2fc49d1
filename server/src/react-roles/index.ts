export { ReactRolesEngine, type EngineDeps, type EngineOptions, type UnbindOptions } from './engine.js';
export { BindingCache } from './binding-cache.js';
export { LinkRegistry, type LinkGroupInfo } from './link-registry.js';
export { MutationQueue, type MemberIntent } from './mutation-queue.js';
export { MutationWorker, type MutationWorkerOptions, type ProcessOutcome } from './mutation-worker.js';
export { Reconciler, REACTORS_PAGE_SIZE, type ProgressListener } from './reconciler.js';
export { ReactionHandlers } from './handlers.js';
export { normalizeSymbol } from './symbols.js';
export * from './errors.js';
export * from './types.js';
