const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** 32-bit FNV-1a. Stable across processes and restarts. */
export function hashKey(key: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Pick the inbound shard for a phone. Every message from one phone lands on
 * the same shard, and each shard is consumed with concurrency 1.
 */
export function shardForPhone(phone: string, shards: number): number {
  return hashKey(phone) % shards;
}

export function inboundQueueName(shard: number): string {
  return `complaints-inbound-${shard}`;
}

export const MAINTENANCE_QUEUE_NAME = 'complaints-maintenance';
