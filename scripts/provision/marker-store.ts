/**
 * Durable record of completed phases.
 *
 * The file backend keeps every marker in one JSON document
 * (`paths.stateFile`, `/var/lib/labforge/state.json` by default):
 *
 *   { "version": 1, "phases": { "<phaseId>": { phaseId, completedAt, warnings } } }
 *
 * Only the sequencer writes markers. There is no removal in the interface;
 * `resetMarkers` is the operator's out-of-band escape hatch.
 */

import { z } from 'zod';
import { readJSON, writeJSONAtomic } from '../lib/config.js';

export interface MarkerRecord {
  phaseId: string;
  completedAt: string;
  warnings: string[];
}

export interface MarkerStore {
  isComplete(phaseId: string): boolean;
  markComplete(phaseId: string, detail?: { warnings?: string[] }): void;
  list(): MarkerRecord[];
}

const MarkerRecordSchema = z.object({
  phaseId: z.string(),
  completedAt: z.string(),
  warnings: z.array(z.string()).default([])
});

const MarkerStateSchema = z.object({
  version: z.literal(1),
  phases: z.record(z.string(), MarkerRecordSchema)
});

type MarkerState = z.infer<typeof MarkerStateSchema>;

function createEmptyMarkerState(): MarkerState {
  return { version: 1, phases: {} };
}

export function readMarkerState(filePath: string): MarkerState {
  const parsed = MarkerStateSchema.safeParse(readJSON(filePath));
  return parsed.success ? parsed.data : createEmptyMarkerState();
}

function toRecord(phaseId: string, detail?: { warnings?: string[] }): MarkerRecord {
  return {
    phaseId,
    completedAt: new Date().toISOString(),
    warnings: detail?.warnings ?? []
  };
}

export class FileMarkerStore implements MarkerStore {
  constructor(readonly filePath: string) {}

  // Read on every call: the notebook unit's precondition polls this file from another process.
  isComplete(phaseId: string): boolean {
    return Object.prototype.hasOwnProperty.call(readMarkerState(this.filePath).phases, phaseId);
  }

  markComplete(phaseId: string, detail?: { warnings?: string[] }): void {
    const state = readMarkerState(this.filePath);
    const next: MarkerState = {
      ...state,
      phases: { ...state.phases, [phaseId]: toRecord(phaseId, detail) }
    };
    writeJSONAtomic(this.filePath, next);
  }

  list(): MarkerRecord[] {
    return Object.values(readMarkerState(this.filePath).phases);
  }
}

export class MemoryMarkerStore implements MarkerStore {
  private readonly records = new Map<string, MarkerRecord>();

  constructor(completed: string[] = []) {
    for (const phaseId of completed) this.records.set(phaseId, toRecord(phaseId));
  }

  isComplete(phaseId: string): boolean {
    return this.records.has(phaseId);
  }

  markComplete(phaseId: string, detail?: { warnings?: string[] }): void {
    this.records.set(phaseId, toRecord(phaseId, detail));
  }

  list(): MarkerRecord[] {
    return [...this.records.values()];
  }
}

/**
 * Operator reset: drop the named markers, or every marker when none are named.
 * Returns the phase ids that were removed.
 */
export function resetMarkers(filePath: string, phaseIds?: string[]): string[] {
  const state = readMarkerState(filePath);
  const targets = phaseIds && phaseIds.length > 0 ? phaseIds : Object.keys(state.phases);
  const removed = targets.filter((id) => Object.prototype.hasOwnProperty.call(state.phases, id));
  if (removed.length === 0) return [];

  const phases = Object.fromEntries(Object.entries(state.phases).filter(([id]) => !removed.includes(id)));
  writeJSONAtomic(filePath, { ...state, phases });
  return removed;
}
