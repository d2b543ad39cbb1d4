import { z } from 'zod';
import { parseOrThrow } from '../lib/validate.js';
import { ProgressEventSchema } from './schemas.js';
import type { ProgressEvent, Roadmap, RoadmapUnit } from './types.js';

export const ProgressInputSchema = ProgressEventSchema.extend({
  subject_kind: ProgressEventSchema.shape.subject_kind.default('unit'),
  fraction: ProgressEventSchema.shape.fraction.default(1),
  recorded_at: ProgressEventSchema.shape.recorded_at.optional(),
});

export type ProgressInput = z.input<typeof ProgressInputSchema>;

export type UnitStatus = 'not_started' | 'in_progress' | 'completed';

export interface UnitProgress {
  unit: RoadmapUnit;
  fraction: number;
  status: UnitStatus;
}

export interface ProgressSummary {
  completed: number;
  total: number;
  percent: number;
}

function statusOf(fraction: number): UnitStatus {
  if (fraction >= 1) return 'completed';
  if (fraction > 0) return 'in_progress';
  return 'not_started';
}

/**
 * Append-only log of unit and session progress for one learner.
 *
 * `version` counts recorded events. A roadmap remembers the version it was
 * built against, so a mismatch means it must be regenerated before the next
 * read, as must a roadmap whose review horizon has passed.
 */
export class ProgressTracker {
  private readonly log: ProgressEvent[];
  private currentVersion: number;

  constructor(
    events: readonly ProgressEvent[] = [],
    version = events.length,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.log = events.map((event) => ({ ...event }));
    this.currentVersion = version;
  }

  get version(): number {
    return this.currentVersion;
  }

  get events(): ProgressEvent[] {
    return this.log.map((event) => ({ ...event }));
  }

  recordCompletion(input: ProgressInput): ProgressEvent {
    const parsed = parseOrThrow(ProgressInputSchema, input, 'progress event');
    const event: ProgressEvent = {
      ...parsed,
      recorded_at: parsed.recorded_at ?? this.now().toISOString(),
    };
    this.log.push(event);
    this.currentVersion += 1;
    return { ...event };
  }

  /** Stale when either version moved or the roadmap's review horizon has passed. */
  isRoadmapStale(roadmap: Roadmap | null, masteryVersion: number): boolean {
    return roadmap === null
      || roadmap.progress_version !== this.currentVersion
      || roadmap.mastery_version !== masteryVersion
      || (roadmap.review_due_at !== undefined && this.now().getTime() > Date.parse(roadmap.review_due_at));
  }

  /** Latest recorded fraction for a subject. */
  fractionOf(subjectId: string): number | undefined {
    for (let i = this.log.length - 1; i >= 0; i--) {
      if (this.log[i].subject_id === subjectId) return this.log[i].fraction;
    }
    return undefined;
  }

  snapshot(units: readonly RoadmapUnit[]): UnitProgress[] {
    return units.map((unit) => {
      const fraction = this.fractionOf(unit.id) ?? 0;
      return { unit, fraction, status: statusOf(fraction) };
    });
  }

  /**
   * Completed units for the role (including ones since dropped from the
   * roadmap because their gap closed) against all units ever planned.
   * A roadmap with nothing left to do is 100%.
   */
  summary(role: string, units: readonly RoadmapUnit[]): ProgressSummary {
    const prefix = `${role}:`;
    const completed = new Set<string>();
    for (const event of this.log) {
      if (event.subject_kind !== 'unit' || !event.subject_id.startsWith(prefix)) continue;
      if (this.fractionOf(event.subject_id) === 1) completed.add(event.subject_id);
    }
    const open = units.filter((unit) => !completed.has(unit.id)).length;
    const total = completed.size + open;
    const percent = total === 0 ? 100 : Math.round((completed.size / total) * 100);
    return { completed: completed.size, total, percent };
  }

  completedSessions(): string[] {
    const ids = new Set<string>();
    for (const event of this.log) {
      if (event.subject_kind === 'session' && this.fractionOf(event.subject_id) === 1) ids.add(event.subject_id);
    }
    return [...ids];
  }
}
