import { execCmd, type CommandRunner } from '../lib/process.js';
import { readLabConfig, resolveConfigPath } from '../lib/lab-config.js';
import type { LabConfig } from '../schemas/lab-config.zod.js';
import { createHostCapabilities, type HostCapabilities } from './capabilities/index.js';
import { systemClock, type Clock } from './clock.js';
import { buildLabPlan } from './lab-plan.js';
import { createFileLogger, type ProvisionLogger } from './logger.js';
import { FileMarkerStore, type MarkerStore } from './marker-store.js';
import { ServiceRegistrar } from './service-registrar.js';
import type { Phase, RetryPolicy } from './types.js';

/** Seams the CLI leaves open for tests and embedding. */
export type RuntimeOverrides = {
  runner?: CommandRunner;
  clock?: Clock;
  logger?: ProvisionLogger;
  processEnv?: NodeJS.ProcessEnv;
  cwd?: string;
  pathExists?: (p: string) => boolean;
  /** Receives machine-readable output (`status`, `plan --json`). */
  stdout?: (text: string) => void;
};

export type ProvisionRuntime = {
  configPath: string;
  config: LabConfig;
  logger: ProvisionLogger;
  store: MarkerStore;
  clock: Clock;
  retry: RetryPolicy;
};

export type PlanRuntime = ProvisionRuntime & {
  host: HostCapabilities;
  registrar: ServiceRegistrar;
  plan: Phase[];
};

/**
 * Resolve and load the config, then open the audit log and marker store it
 * names. Throws `ConfigError` when the config is missing or invalid.
 */
export function createProvisionRuntime(explicitConfig: string | undefined, overrides: RuntimeOverrides = {}): ProvisionRuntime {
  const configPath = resolveConfigPath(explicitConfig, { cwd: overrides.cwd, processEnv: overrides.processEnv });
  const config = readLabConfig(configPath, { processEnv: overrides.processEnv });

  return {
    configPath,
    config,
    logger: overrides.logger ?? createFileLogger(config.paths.logFile, { echo: true }),
    store: new FileMarkerStore(config.paths.stateFile),
    clock: overrides.clock ?? systemClock,
    retry: { maxAttempts: config.retry.maxAttempts, baseDelayMs: config.retry.baseDelaySec * 1000 }
  };
}

export function createPlanRuntime(explicitConfig: string | undefined, overrides: RuntimeOverrides = {}): PlanRuntime {
  const runtime = createProvisionRuntime(explicitConfig, overrides);
  const { config, configPath, logger } = runtime;

  const host = createHostCapabilities(config, overrides.runner ?? execCmd);
  const registrar = new ServiceRegistrar({
    supervisor: host.supervisor,
    logger,
    render: {
      cliCommand: config.paths.cli,
      configPath,
      awaitTimeoutSec: config.readiness.awaitPhaseTimeoutSec,
      awaitIntervalSec: config.readiness.awaitPhaseIntervalSec
    }
  });
  const plan = buildLabPlan(config, host, { registrar, configPath, pathExists: overrides.pathExists });

  return { ...runtime, host, registrar, plan };
}
