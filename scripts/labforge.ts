#!/usr/bin/env node

import fs from 'fs';
import { fileURLToPath } from 'url';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';

import { ConfigError, errorMessage, UsageError } from './provision/errors.js';
import { createPlanRuntime, createProvisionRuntime, type RuntimeOverrides } from './provision/cli-runtime.js';
import { resetMarkers } from './provision/marker-store.js';
import { describeReadiness, markerPredicate, waitFor } from './provision/readiness.js';
import { serviceUnits } from './provision/lab-plan.js';
import { exitCodeFor, runSequence } from './provision/sequencer.js';
import { collectStatus, describePlan, formatPlan } from './provision/status.js';
import { printSequenceSummary } from './provision/summary.js';
import { print, symbols } from './utils.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

/**
 * Parse `argv` and run one command. Resolves to the process exit code instead
 * of exiting, so callers decide what to do with it.
 */
async function main(argv = process.argv, overrides: RuntimeOverrides = {}): Promise<number> {
  let exitCode = EXIT_OK;
  const write =
    overrides.stdout ??
    ((text: string) => {
      process.stdout.write(text);
    });

  const y = yargs(hideBin(argv))
    .scriptName('labforge')
    .option('config', {
      type: 'string',
      describe: 'Path to lab.config.yml (defaults to $LABFORGE_CONFIG, then the nearest lab.config.yml)'
    })
    .command(
      ['run', '$0'],
      'Provision the lab, resuming after the last completed phase',
      (yy) => yy,
      async (args) => {
        const runtime = createPlanRuntime(args.config, overrides);
        runtime.logger.info({ config: runtime.configPath }, 'provision.start');
        const result = await runSequence(runtime.plan, {
          store: runtime.store,
          logger: runtime.logger,
          clock: runtime.clock,
          retry: runtime.retry
        });
        printSequenceSummary(result, { logFilePath: runtime.config.paths.logFile });
        exitCode = exitCodeFor(result);
      }
    )
    .command(
      'status',
      'Print completed phases and the latest audit records as JSON',
      (yy) => yy.option('tail', { type: 'number', default: 20, describe: 'Number of audit records to include' }),
      async (args) => {
        const runtime = createPlanRuntime(args.config, overrides);
        const status = await collectStatus({
          phases: runtime.plan,
          store: runtime.store,
          supervisor: runtime.host.supervisor,
          units: serviceUnits(runtime.config),
          logFilePath: runtime.config.paths.logFile,
          tail: args.tail
        });
        write(JSON.stringify(status, null, 2) + '\n');
      }
    )
    .command(
      'plan',
      'List phases and steps with their completion state',
      (yy) => yy.option('json', { type: 'boolean', default: false, describe: 'Print the plan as JSON' }),
      (args) => {
        const runtime = createPlanRuntime(args.config, overrides);
        const planned = describePlan(runtime.plan, runtime.store);
        if (args.json) {
          write(JSON.stringify(planned, null, 2) + '\n');
          return;
        }
        for (const line of formatPlan(planned)) print(line, line.startsWith(' ') ? 'gray' : 'reset');
      }
    )
    .command(
      'await-phase <phaseId>',
      'Block until a phase has completed (used by service units)',
      (yy) =>
        yy
          .positional('phaseId', { type: 'string', demandOption: true, describe: 'Phase id to wait for' })
          .option('timeout-sec', { type: 'number', describe: 'Give up after this many seconds' })
          .option('interval-sec', { type: 'number', describe: 'Seconds between checks' }),
      async (args) => {
        const runtime = createProvisionRuntime(args.config, overrides);
        const { readiness } = runtime.config;
        const target = `phase ${args.phaseId}`;
        const result = await waitFor(
          {
            target,
            predicate: markerPredicate(runtime.store, args.phaseId),
            intervalMs: (args['interval-sec'] ?? readiness.awaitPhaseIntervalSec) * 1000,
            timeoutMs: (args['timeout-sec'] ?? readiness.awaitPhaseTimeoutSec) * 1000,
            progressEvery: readiness.progressEvery
          },
          { clock: runtime.clock, logger: runtime.logger }
        );
        const ready = result.status === 'ready';
        print(`${ready ? symbols.success : symbols.error} ${describeReadiness(target, result)}`, ready ? 'green' : 'red');
        exitCode = ready ? EXIT_OK : EXIT_FAILED;
      }
    )
    .command(
      'reset [phaseIds..]',
      'Forget completed phases so the next run repeats them',
      (yy) =>
        yy
          .positional('phaseIds', { type: 'string', array: true, describe: 'Phase ids to reset' })
          .option('all', { type: 'boolean', default: false, describe: 'Reset every phase' }),
      (args) => {
        const phaseIds = args.phaseIds ?? [];
        if (phaseIds.length === 0 && !args.all) {
          throw new UsageError('Name the phases to reset, or pass --all');
        }
        const runtime = createProvisionRuntime(args.config, overrides);
        const removed = resetMarkers(runtime.config.paths.stateFile, args.all ? undefined : phaseIds);
        runtime.logger.warn({ removed }, 'markers.reset');
        print(
          removed.length > 0 ? `${symbols.info} Reset: ${removed.join(', ')}` : `${symbols.info} Nothing to reset`,
          'cyan'
        );
      }
    )
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      if (err instanceof Error) throw err;
      throw new UsageError(msg);
    })
    .help();

  try {
    await y.parseAsync();
  } catch (e: unknown) {
    const usage = e instanceof ConfigError || e instanceof UsageError;
    print(`${symbols.error} ${errorMessage(e)}`, 'red');
    return usage ? EXIT_USAGE : EXIT_FAILED;
  }
  return exitCode;
}

function isDirectRun(): boolean {
  if (!process.argv[1]) return false;
  try {
    return fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e instanceof Error ? e.stack ?? e.message : String(e));
      process.exitCode = EXIT_FAILED;
    }
  );
}

export { main };
