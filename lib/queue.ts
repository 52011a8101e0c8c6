// queue.ts
import { Queue } from "bullmq";
import IORedis from "ioredis";
import type { BootstrapJobData } from "./schema/configSchema";

export const BOOTSTRAP_JOB = "bootstrap";

export function createRedis(url: string): IORedis {
  return new IORedis(url, { maxRetriesPerRequest: null, enableReadyCheck: false });
}

export function createBootstrapQueue(connection: IORedis, name: string): Queue<BootstrapJobData> {
  // a rerun is the retry: bootstrap steps are idempotent, BullMQ attempts are not needed
  return new Queue<BootstrapJobData>(name, {
    connection,
    defaultJobOptions: { removeOnComplete: 100, removeOnFail: 100, attempts: 1 },
  });
}
