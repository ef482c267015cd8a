import { print, symbols, type Color } from '../utils.js';
import type { PhaseReport, PhaseStatus, SequenceResult } from './types.js';

const STATUS_STYLE: Record<PhaseStatus, { symbol: string; color: Color }> = {
  skipped: { symbol: symbols.skip, color: 'gray' },
  completed: { symbol: symbols.success, color: 'green' },
  'completed-with-warnings': { symbol: symbols.warning, color: 'yellow' },
  'tolerated-failure': { symbol: symbols.warning, color: 'yellow' },
  failed: { symbol: symbols.error, color: 'red' },
  'not-run': { symbol: symbols.skip, color: 'gray' }
};

export function formatPhaseLine(report: PhaseReport): string {
  const { symbol } = STATUS_STYLE[report.status];
  const label = report.title ? `${report.id} (${report.title})` : report.id;
  const steps = report.steps.length > 0 ? `, ${report.steps.length} step(s)` : '';
  return `  ${symbol} ${label}: ${report.status}${steps}`;
}

export function printSequenceSummary(result: SequenceResult, params: { logFilePath: string }): void {
  if (result.status === 'completed') {
    const ran = result.stepsRun === 0 ? 'nothing to do' : `${result.stepsRun} step(s) run`;
    print(`\n${symbols.success} Provisioning complete (${ran})`, 'green');
  } else {
    print(`\n${symbols.error} Provisioning stopped at ${result.failedPhase ?? 'validation'}`, 'red');
  }

  for (const phase of result.phases) {
    print(formatPhaseLine(phase), STATUS_STYLE[phase.status].color);
    for (const warning of phase.warnings) {
      print(`      ${warning}`, 'gray');
    }
  }

  if (result.status === 'failed') {
    if (result.error) print(`  ${result.error}`, 'red');
    print(`  ${symbols.info} See log: ${params.logFilePath}`, 'cyan');
  }
}
