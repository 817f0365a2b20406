/**
 * benchctl command line.
 *
 *   benchctl serve [--hardware-mock]
 *   benchctl validate experiment.yaml
 *   benchctl schedule experiment.yaml
 *   benchctl jobs
 *   benchctl archive [--clear]
 *
 * `schedule`, `jobs` and `archive` work on the data directory directly, so
 * they can be used next to a running server.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { closeApp, initializeApp, startServer, type AppContext } from './server.js';
import { TaskRegistry } from './tasks/TaskRegistry.js';
import { TaskValidator } from './tasks/TaskValidator.js';
import { INSTRUMENT_TASKS } from './tasks/instrumentTasks.js';
import type { ExperimentValidation } from './tasks/types.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

const processIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function printValidation(io: CliIO, validation: ExperimentValidation): void {
  if (validation.level === 'invalid_yaml') {
    for (const error of validation.errors) io.err(error);
    return;
  }
  for (const step of validation.steps) {
    io.out(`${step.ok ? 'OK  ' : 'FAIL'} ${step.step} - ${step.message}`);
  }
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();
  program
    .name('benchctl')
    .description('Remote operation and time-scheduled control of laboratory test instruments')
    .version('0.1.0')
    .option('-c, --config <path>', 'configuration file (default: $CONFIG_PATH or ./config.yaml)');

  async function config(): Promise<AppConfig> {
    const { config: configPath } = program.opts<{ config?: string }>();
    return loadConfig(configPath ? { configPath } : {});
  }

  /**
   * One-shot commands keep logging out of their output unless asked for.
   */
  async function withApp(fn: (ctx: AppContext) => Promise<void>): Promise<void> {
    const appConfig = await config();
    const level = appConfig.server.logLevel;
    if (process.env['LOG_LEVEL'] === undefined && (level === 'debug' || level === 'info')) {
      appConfig.server.logLevel = 'warn';
    }
    const ctx = await initializeApp(appConfig);
    try {
      await fn(ctx);
    } finally {
      await closeApp(ctx);
    }
  }

  program
    .command('serve')
    .description('Run the HTTP API, the scheduler and the device monitor')
    .option('--hardware-mock', 'serve simulated instruments instead of probing hardware')
    .action(async (options: { hardwareMock?: boolean }) => {
      const appConfig = await config();
      if (options.hardwareMock) {
        appConfig.devices.hardwareMock = true;
      }
      await startServer(appConfig);
    });

  program
    .command('validate <file>')
    .description('Check an experiment file without scheduling it')
    .action(async (file: string) => {
      const validator = new TaskValidator(new TaskRegistry(INSTRUMENT_TASKS));
      const validation = validator.validateExperimentYaml(await readFile(file, 'utf-8'));
      printValidation(io, validation);
      if (validation.ok) {
        io.out('Experiment is valid.');
      } else {
        io.err(`Experiment is invalid (${validation.errors.length} error(s)).`);
        io.setExitCode(1);
      }
    });

  program
    .command('schedule <file>')
    .description('Validate an experiment file and schedule all of its steps')
    .action(async (file: string) => {
      const text = await readFile(file, 'utf-8');
      await withApp(async (ctx) => {
        const submission = await ctx.experiments.submitYaml(text);
        if (!submission.scheduled) {
          printValidation(io, submission.validation);
          io.err('Nothing was scheduled.');
          io.setExitCode(1);
          return;
        }
        const jobs = await ctx.timekeeper.getJobs();
        io.out(`Scheduled "${submission.name ?? ''}": ${submission.jobIds.length} job(s)`);
        for (const jobId of submission.jobIds) {
          const job = jobs[jobId];
          io.out(`${jobId}  ${job?.schedule_time ?? '?'}  ${job?.task ?? '?'}`);
        }
      });
    });

  program
    .command('jobs')
    .description('List pending jobs in firing order')
    .action(async () => {
      await withApp(async (ctx) => {
        const jobs = await ctx.timekeeper.listJobs();
        if (jobs.length === 0) {
          io.out('No pending jobs.');
          return;
        }
        for (const job of jobs) {
          io.out(`${job.jobId}  ${job.scheduleTime}  ${job.taskName}  ${JSON.stringify(job.kwargs)}`);
        }
      });
    });

  program
    .command('archive')
    .description('List finished jobs')
    .option('--clear', 'remove every archive entry')
    .action(async (options: { clear?: boolean }) => {
      await withApp(async (ctx) => {
        if (options.clear) {
          io.out(`Removed ${await ctx.timekeeper.clearArchive()} archive entries.`);
          return;
        }
        const entries = Object.values(await ctx.timekeeper.getArchive()).sort((a, b) =>
          a.completionTime.localeCompare(b.completionTime)
        );
        if (entries.length === 0) {
          io.out('Archive is empty.');
          return;
        }
        for (const entry of entries) {
          const outcome = entry.status === 'failed' ? `failed (${entry.failureClass ?? 'task_error'}): ${entry.error ?? ''}` : 'completed';
          io.out(`${entry.jobId}  ${entry.completionTime}  ${entry.taskName}  ${outcome}`);
        }
      });
    });

  return program;
}
