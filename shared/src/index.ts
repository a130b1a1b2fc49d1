// Schemas
export * from './schemas/index.js';

// Types
export type {
  MessageRef,
  MemberRef,
  ReconcileProgress,
  WorkerCounters,
  QueueStatus,
} from './types/react-roles.js';
