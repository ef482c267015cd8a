/**
 * Declares long-running services to the supervisor.
 *
 * Ordering on a phase is enforced by the service itself: a declaration with
 * `afterPhase` gets an `ExecStartPre` that runs `labforge await-phase` (run privileged), which
 * blocks on the marker before the real process starts. Restart policy belongs
 * to the supervisor from then on; the sequencer never touches the service again.
 */

import type { ServiceSupervisor } from './capabilities/supervisor.js';
import type { ProvisionLogger } from './logger.js';

export type RestartPolicy = 'never' | 'on-failure' | 'always';

export type ServiceDeclaration = {
  name: string;
  description: string;
  command: string;
  type?: 'oneshot' | 'simple';
  restart?: RestartPolicy;
  restartSec?: number;
  /** Services this one starts after. */
  after?: string[];
  wants?: string[];
  /** Phase whose marker must exist before the service does real work. */
  afterPhase?: string;
  user?: string;
  group?: string;
  workingDirectory?: string;
  environment?: Record<string, string>;
  /** Start right after registration (otherwise only enabled for next boot). */
  startNow?: boolean;
};

export type UnitRenderOptions = {
  /** Command used for the `afterPhase` precondition, e.g. `/usr/local/bin/labforge`. */
  cliCommand: string;
  configPath?: string;
  awaitTimeoutSec: number;
  awaitIntervalSec: number;
};

const NETWORK_TARGET = 'network-online.target';

const RESTART_VALUES: Record<RestartPolicy, string> = {
  never: 'no',
  'on-failure': 'on-failure',
  always: 'always'
};

export function unitFileName(name: string): string {
  return name.endsWith('.service') || name.endsWith('.target') ? name : `${name}.service`;
}

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

export function awaitPhaseCommand(phaseId: string, opts: UnitRenderOptions): string {
  return [
    opts.cliCommand,
    ...(opts.configPath ? ['--config', opts.configPath] : []),
    'await-phase',
    phaseId,
    '--timeout-sec',
    String(opts.awaitTimeoutSec),
    '--interval-sec',
    String(opts.awaitIntervalSec)
  ].join(' ');
}

export function renderUnit(decl: ServiceDeclaration, opts: UnitRenderOptions): string {
  const type = decl.type ?? 'simple';
  const restart = decl.restart ?? 'never';
  const wants = uniq([NETWORK_TARGET, ...(decl.wants ?? []).map(unitFileName)]);
  const after = uniq([NETWORK_TARGET, ...(decl.after ?? []).map(unitFileName)]);

  const lines = ['[Unit]', `Description=${decl.description}`, `Wants=${wants.join(' ')}`, `After=${after.join(' ')}`, ''];

  lines.push('[Service]', `Type=${type}`);
  if (type === 'oneshot') {
    lines.push('RemainAfterExit=yes', 'TimeoutStartSec=0');
  }
  if (decl.user) lines.push(`User=${decl.user}`);
  if (decl.group ?? decl.user) lines.push(`Group=${decl.group ?? decl.user}`);
  if (decl.workingDirectory) lines.push(`WorkingDirectory=${decl.workingDirectory}`);
  for (const [key, value] of Object.entries(decl.environment ?? {})) {
    lines.push(`Environment="${key}=${value}"`);
  }
  if (decl.afterPhase) {
    // The precondition may wait for a long time; it is bounded by its own timeout.
    if (type !== 'oneshot') lines.push('TimeoutStartSec=infinity');
    // "+": the wait runs privileged so it can read the state file whatever User= says.
    lines.push(`ExecStartPre=+${awaitPhaseCommand(decl.afterPhase, opts)}`);
  }
  lines.push(`ExecStart=${decl.command}`);
  lines.push(`Restart=${RESTART_VALUES[restart]}`);
  if (restart !== 'never' && decl.restartSec !== undefined) {
    lines.push(`RestartSec=${decl.restartSec}`);
  }
  lines.push('', '[Install]', 'WantedBy=multi-user.target', '');

  return lines.join('\n');
}

export class ServiceRegistrar {
  constructor(
    private readonly opts: {
      supervisor: ServiceSupervisor;
      logger: ProvisionLogger;
      render: UnitRenderOptions;
    }
  ) {}

  async register(decl: ServiceDeclaration): Promise<void> {
    const { supervisor, logger } = this.opts;
    const unitName = unitFileName(decl.name);
    const content = renderUnit(decl, this.opts.render);

    if (supervisor.readUnit(unitName) === content) {
      logger.info({ unit: unitName }, 'service.unchanged');
    } else {
      await supervisor.installUnit(unitName, content);
      await supervisor.daemonReload();
      logger.info({ unit: unitName, afterPhase: decl.afterPhase, restart: decl.restart ?? 'never' }, 'service.installed');
    }

    await supervisor.enable(unitName);
    if (decl.startNow) {
      await supervisor.start(unitName);
      logger.info({ unit: unitName }, 'service.started');
    }
  }
}
