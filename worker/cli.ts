#!/usr/bin/env node
/**
 * kubelab CLI
 *
 * Commands:
 *   plan        - Print the machine definitions the Vagrantfile consumes
 *   run         - Bootstrap the cluster from this host, once
 *   enqueue     - Queue a bootstrap for the BullMQ worker
 *   job <id>    - Show the state of a queued bootstrap
 */
import "dotenv/config";
import { Command } from "commander";
import { loadConfig, parseJobOverrides, withJobOverrides, type ClusterConfig } from "../lib/config";
import { BootstrapError } from "../lib/errors";
import { buildPlan, toMachineDefinitions } from "../lib/plan";
import { BOOTSTRAP_JOB, createBootstrapQueue, createRedis } from "../lib/queue";
import type { BootstrapJobData } from "../lib/schema/configSchema";
import { createSupabaseClient, createSupabaseReporter } from "../lib/supabase/cluster";
import { loadTrustMaterial } from "./context";
import { runBootstrap } from "./driver";
import { SshRunner } from "./ssh";

type PlanOptions = { plugin?: string; workers?: string; coordinator?: string; name?: string };

function overrides(opts: PlanOptions): BootstrapJobData {
  return parseJobOverrides({
    clusterName: opts.name,
    networkPlugin: opts.plugin,
    coordinatorAddress: opts.coordinator,
    workerCount: opts.workers === undefined ? undefined : Number(opts.workers),
  });
}

function configFor(opts: PlanOptions): ClusterConfig {
  return withJobOverrides(loadConfig(), overrides(opts));
}

function withPlanOptions(cmd: Command): Command {
  return cmd
    .option("-p, --plugin <name>", "network plugin: calico, canal, flannel, weave, romana")
    .option("-w, --workers <count>", "number of workers")
    .option("-c, --coordinator <ip>", "coordinator address")
    .option("-n, --name <name>", "cluster name");
}

function fail(error: unknown): never {
  if (error instanceof BootstrapError) {
    console.error(`Error (${error.name}): ${error.message}`);
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`Error: ${String(error)}`);
  }
  process.exit(1);
}

const program = new Command();

program.name("kubelab").description("Bootstrap a kubeadm lab cluster on freshly booted VMs").version("0.1.0");

withPlanOptions(program.command("plan"))
  .description("Print machine definitions (JSON) for the provisioning layer")
  .action((opts: PlanOptions) => {
    try {
      const config = configFor(opts);
      const plan = buildPlan(config);
      console.log(JSON.stringify(toMachineDefinitions(plan, config), null, 2));
    } catch (error) {
      fail(error);
    }
  });

withPlanOptions(program.command("run"))
  .description("Provision, initialize and join every machine in the plan")
  .action(async (opts: PlanOptions) => {
    try {
      const config = configFor(opts);
      const plan = buildPlan(config);
      const trust = await loadTrustMaterial(config.ssh.trustKeyPath);
      const reporter = config.supabase
        ? createSupabaseReporter(
            createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey),
            config.k8sSeries
          )
        : null;
      const runner = new SshRunner({ user: config.ssh.user, key: config.ssh.keyPath, timeoutMs: config.ssh.timeoutMs });

      const report = await runBootstrap(plan, { runner, config, trust, reporter });
      console.log(report.summary);
      // a short cluster is not a success
      process.exit(report.joined === report.total ? 0 : 2);
    } catch (error) {
      fail(error);
    }
  });

withPlanOptions(program.command("enqueue"))
  .description("Queue a bootstrap for the worker process")
  .action(async (opts: PlanOptions) => {
    try {
      const config = loadConfig();
      if (!config.redisUrl) throw new Error("REDIS_URL is required to enqueue");
      const data = overrides(opts);
      buildPlan(withJobOverrides(config, data)); // reject bad input before it reaches the queue

      const connection = createRedis(config.redisUrl);
      const queue = createBootstrapQueue(connection, config.queueName);
      const job = await queue.add(BOOTSTRAP_JOB, data);
      console.log({ id: job.id, status: "QUEUED" });
      await queue.close();
      await connection.quit();
    } catch (error) {
      fail(error);
    }
  });

program
  .command("job <id>")
  .description("Show state, failure reason and result of a queued bootstrap")
  .action(async (id: string) => {
    try {
      const config = loadConfig();
      if (!config.redisUrl) throw new Error("REDIS_URL is required");
      const connection = createRedis(config.redisUrl);
      const queue = createBootstrapQueue(connection, config.queueName);
      const job = await queue.getJob(id);
      if (!job) {
        console.log("No such job");
      } else {
        console.log({ id: job.id, state: await job.getState() });
        console.log("failedReason:", job.failedReason);
        console.log("data:", job.data);
        console.log("returnvalue:", job.returnvalue);
      }
      await queue.close();
      await connection.quit();
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
