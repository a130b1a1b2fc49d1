// ============================================
// References
// ============================================

/**
 * Points at a single message in a guild channel
 */
export interface MessageRef {
  guildId: string;
  channelId: string;
  messageId: string;
}

/**
 * Points at a member of a guild
 */
export interface MemberRef {
  guildId: string;
  userId: string;
}

// ============================================
// Reconciliation
// ============================================

export interface ReconcileProgress {
  /** Reactions looked at so far (the bot's own marker reactions excluded) */
  checked: number;
  /** Reactions on the message, the bot's own marker reactions excluded */
  total: number;
  /** Distinct symbols visited so far */
  emojis: number;
  granted: number;
  /** Reactors that could not be checked, e.g. because they left the guild */
  skipped: number;
}

// ============================================
// Queue status
// ============================================

export interface WorkerCounters {
  processed: number;
  writes: number;
  noops: number;
  retries: number;
  dropped: number;
}

export interface QueueStatus {
  running: boolean;
  pending: number;
  counters: WorkerCounters;
}
