import type { ConnectionOptions } from "bullmq";

/** Splits a `redis://[user:password@]host[:port][/db]` URL into bullmq connection options. */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = Number(parsed.pathname.replace(/^\//, ""));

  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: Number.isInteger(db) && db > 0 ? db : undefined,
    ...(parsed.protocol === "rediss:" ? { tls: {} } : {}),
    // bullmq rejects worker connections that retry per request
    maxRetriesPerRequest: null,
  };
}
