// worker/index.ts
import "dotenv/config";
import { Worker } from "bullmq";
import { loadConfig } from "../lib/config";
import { createRedis } from "../lib/queue";
import type { BootstrapJobData } from "../lib/schema/configSchema";
import { createSupabaseClient, createSupabaseReporter } from "../lib/supabase/cluster";
import type { BootstrapReport } from "../lib/types";
import { loadTrustMaterial } from "./context";
import { createBootstrapProcessor } from "./processor";
import { SshRunner } from "./ssh";

const config = loadConfig();
if (!config.redisUrl) {
  console.error("[worker] REDIS_URL is required to run the queue worker");
  process.exit(1);
}

const connection = createRedis(config.redisUrl);
const reporter = config.supabase
  ? createSupabaseReporter(createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey), config.k8sSeries)
  : null;

const processor = createBootstrapProcessor({
  config,
  runner: new SshRunner({ user: config.ssh.user, key: config.ssh.keyPath, timeoutMs: config.ssh.timeoutMs }),
  loadTrust: loadTrustMaterial,
  reporter,
});

// one cluster build at a time: the hypervisor serializes machine work anyway
const worker = new Worker<BootstrapJobData, BootstrapReport>(config.queueName, processor, {
  connection,
  concurrency: 1,
});

worker.on("ready", () => console.log(`[worker] ready on ${config.queueName}`));
worker.on("active", (job) => console.log(`[worker] active ${job.id}`));
worker.on("completed", (job, res) => console.log(`[worker] completed ${job.id}`, res.summary));
worker.on("failed", (job, err) => console.error(`[worker] failed ${job?.id}`, err.stack ?? err));
worker.on("error", (err) => console.error("[worker] runtime error", err));

async function shutdown(signal: string) {
  console.log(`[worker] ${signal}, closing`);
  await worker.close();
  await connection.quit();
  process.exit(0);
}
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err) => {
      console.error("[worker] shutdown failed", err);
      process.exit(1);
    });
  });
}
