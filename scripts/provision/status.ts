import type { ServiceState, ServiceSupervisor } from './capabilities/supervisor.js';
import { readAuditLog, type AuditRecord } from './logger.js';
import type { MarkerRecord, MarkerStore } from './marker-store.js';
import type { Phase } from './types.js';

export type ProvisionStatus = {
  completed: MarkerRecord[];
  pending: string[];
  /** Supervisor state of each registered unit, keyed by unit file name. */
  services: Record<string, ServiceState>;
  recentLog: AuditRecord[];
};

export async function collectStatus(params: {
  phases: Phase[];
  store: MarkerStore;
  supervisor: ServiceSupervisor;
  units: string[];
  logFilePath: string;
  tail?: number;
}): Promise<ProvisionStatus> {
  const { phases, store, supervisor } = params;
  const services: Record<string, ServiceState> = {};
  for (const unit of params.units) {
    services[unit] = await supervisor.status(unit);
  }
  return {
    completed: store.list(),
    pending: phases.filter((p) => !store.isComplete(p.id)).map((p) => p.id),
    services,
    recentLog: readAuditLog(params.logFilePath, { tail: params.tail ?? 20 })
  };
}

export type PlannedPhase = {
  id: string;
  title?: string;
  complete: boolean;
  dependsOn: string[];
  tolerateFailure: boolean;
  steps: Array<{ id: string; title?: string; failure: 'fatal' | 'tolerable' }>;
};

export function describePlan(phases: Phase[], store: MarkerStore): PlannedPhase[] {
  return phases.map((phase) => ({
    id: phase.id,
    title: phase.title,
    complete: store.isComplete(phase.id),
    dependsOn: phase.dependsOn ?? [],
    tolerateFailure: phase.tolerateFailure ?? false,
    steps: phase.steps.map((step) => ({ id: step.id, title: step.title, failure: step.failure ?? 'fatal' }))
  }));
}

export function formatPlan(planned: PlannedPhase[]): string[] {
  const lines: string[] = [];
  for (const phase of planned) {
    const flags = [
      phase.complete ? 'complete' : 'pending',
      ...(phase.tolerateFailure ? ['tolerate-failure'] : []),
      ...(phase.dependsOn.length > 0 ? [`after ${phase.dependsOn.join(', ')}`] : [])
    ];
    lines.push(`${phase.id} [${flags.join('; ')}]`);
    for (const step of phase.steps) {
      lines.push(`  - ${step.id}${step.failure === 'tolerable' ? ' (tolerable)' : ''}`);
    }
  }
  return lines;
}
