export interface QueueTask {
  label: string;
  run: () => Promise<void>;
}

export interface QueueStats {
  userId: number;
  depth: number;
  processing: boolean;
  lastActivity: number;
  consecutiveFailures: number;
}

export interface QueueConfig {
  idleTimeout: number;
  statsInterval: number;
}

export interface QueueManagerStats {
  timestamp: string;
  totalQueues: number;
  activeQueues: number;
  totalDepth: number;
  queues: QueueStats[];
}
