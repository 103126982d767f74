// packages/retriever/src/redisClient.ts
import { createClient } from "redis";
import { REDIS_CONNECT_RETRIES, REDIS_URL } from "./constants";

type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;
let connectPromise: Promise<void> | null = null;

/** Backoff of 100 ms per attempt (max 1 s); after REDIS_CONNECT_RETRIES the pending connect rejects. */
export function reconnectStrategy(retries: number, cause: Error): number | Error {
  if (retries >= REDIS_CONNECT_RETRIES) {
    return new Error(`Redis unreachable at ${REDIS_URL} after ${retries} retries: ${cause.message}`);
  }
  return Math.min((retries + 1) * 100, 1000);
}

export async function getRedis(): Promise<RedisClient> {
  if (!client) {
    client = createClient({ url: REDIS_URL, socket: { reconnectStrategy } });
    client.on("error", (err) => {
      console.error("[redis] client error:", err instanceof Error ? err.message : err);
    });
  }

  if (!client.isOpen) {
    if (!connectPromise) {
      connectPromise = client
        .connect()
        .then(() => {
          connectPromise = null;
        })
        .catch((e: unknown) => {
          connectPromise = null;
          client = null;
          throw e;
        });
    }
    await connectPromise;
  }

  return client;
}

export async function closeRedis() {
  if (client?.isOpen) {
    await client.quit();
  }
  client = null;
  connectPromise = null;
}
