/**
 * Redis connection for the BullMQ article queue.
 *
 * BullMQ requires ioredis with maxRetriesPerRequest: null. One shared
 * connection serves the queue (CLI side) and the worker.
 */

import Redis from "ioredis";
import logger from "../../utils/logger";

let bullmqConnection: Redis | null = null;

export function getBullMQConnection(redisUrl: string): Redis {
  if (!bullmqConnection) {
    bullmqConnection = new Redis(redisUrl, {
      maxRetriesPerRequest: null, // Required for BullMQ
      retryStrategy: (times) => {
        if (times > 10) return null;
        return Math.min(times * 200, 5000);
      },
      reconnectOnError: (err) => {
        const targetErrors = ["READONLY", "ECONNRESET", "ETIMEDOUT"];
        return targetErrors.some((e) => err.message.includes(e));
      },
    });

    bullmqConnection.on("error", (err) => {
      logger.error({ err }, "bullmq_redis_connection_error");
    });

    bullmqConnection.on("connect", () => {
      logger.info("bullmq_redis_connected");
    });
  }

  return bullmqConnection;
}

/**
 * Close the Redis connection (for graceful shutdown)
 */
export async function closeConnections(): Promise<void> {
  if (bullmqConnection) {
    await bullmqConnection.quit();
    bullmqConnection = null;
  }
  logger.info("redis_connections_closed");
}
