import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import { loadOptionalConfigFile, loadWorkerConfig } from '../config/loader.js';
import type { ConfigOverrides } from '../config/loader.js';
import type { WorkerConfig } from '../schema/config.js';
import { createCollaborators, createEngine } from '../core/engine.js';
import { messageOf } from '../core/errors.js';
import { connectAmqp } from '../queue/broker.js';
import { parseJobMessage, runConsumer } from '../queue/consumer.js';
import { publishJob } from '../queue/publisher.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/summary.js';
import * as log from '../utils/logger.js';

const DEFAULT_CONFIG_PATH = '.uiverify.yaml';
const EXIT_CONFIG_ERROR = 4;

// ── Shared option handling ───────────────────────────────────

interface CommonOptions {
  config: string;
  liveView?: true;
  queue?: string;
  tracing?: true;
}

async function resolveConfig(opts: CommonOptions): Promise<WorkerConfig> {
  const file = await loadOptionalConfigFile(opts.config);
  const overrides: ConfigOverrides = {
    liveView: opts.liveView,
    queue: opts.queue,
    tracing: opts.tracing,
  };
  return loadWorkerConfig(process.env, file, overrides);
}

function fail(prefix: string, err: unknown): void {
  process.stderr.write(`${prefix}: ${messageOf(err)}\n`);
  process.exitCode = EXIT_CONFIG_ERROR;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--live-view', 'Run headed (live-view) and consume the live-view queue')
    .option('--queue <name>', 'Queue name override')
    .option('--tracing', 'Record a Playwright trace; uploaded on failure');
}

// ── worker ───────────────────────────────────────────────────

export function registerWorkerCommand(program: Command): void {
  withCommonOptions(
    program
      .command('worker')
      .description('Consume test-case jobs from the broker until stopped'),
  ).action(async (opts: CommonOptions) => {
    let config: WorkerConfig;
    try {
      config = await resolveConfig(opts);
    } catch (err) {
      fail('Config error', err);
      return;
    }

    const abort = new AbortController();
    const stop = (): void => {
      log.info('Shutting down after the current job...');
      abort.abort();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      const collaborators = await createCollaborators(config);
      const controller = createEngine(config, collaborators);
      log.info(
        `Worker starting (${config.browser.liveView ? 'live view' : 'headless'}) on ${config.broker.queue}`,
      );
      await runConsumer({
        connect: connectAmqp,
        broker: config.broker,
        controller,
        signal: abort.signal,
      });
    } catch (err) {
      fail('Worker error', err);
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
  });
}

// ── run ──────────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  withCommonOptions(
    program
      .command('run')
      .description('Execute one job file directly, without the broker')
      .argument('<job>', 'Path to a test-case job JSON file')
      .option('--json', 'Output JSON to stdout')
      .option('--report-path <dir>', 'Write a markdown report to this directory')
      .option('--offline', 'In-memory object store; no run-record or live-progress calls'),
  ).action(
    async (
      jobPath: string,
      opts: CommonOptions & { json?: true; reportPath?: string; offline?: true },
    ) => {
      try {
        const config = await resolveConfig(opts);
        const job = parseJobMessage(await readFile(jobPath));

        const collaborators = await createCollaborators(config, {
          offline: opts.offline === true,
        });
        const runs = await createEngine(config, collaborators).runJob(job);
        const output = generateJSON(job.test_case_id, runs);

        if (opts.reportPath !== undefined) {
          const dir = path.resolve(opts.reportPath);
          await mkdir(dir, { recursive: true });
          await writeFile(
            path.join(dir, 'report.md'),
            generateMarkdown(job.test_case_id, runs),
            'utf-8',
          );
        }

        if (opts.json) {
          process.stdout.write(serializeJSON(output) + '\n');
        }

        process.exitCode = output.exitCode;
      } catch (err) {
        fail('Error', err);
      }
    },
  );
}

// ── enqueue ──────────────────────────────────────────────────

export function registerEnqueueCommand(program: Command): void {
  withCommonOptions(
    program
      .command('enqueue')
      .description('Publish a job file to the execution queue')
      .argument('<job>', 'Path to a test-case job JSON file'),
  ).action(async (jobPath: string, opts: CommonOptions) => {
    try {
      const config = await resolveConfig(opts);
      const job = parseJobMessage(await readFile(jobPath));

      const connection = await connectAmqp(config.broker.url);
      try {
        const channel = await connection.createChannel();
        await publishJob(channel, config.broker.queue, job);
        await channel.close();
      } finally {
        await connection.close();
      }
    } catch (err) {
      fail('Error', err);
    }
  });
}
