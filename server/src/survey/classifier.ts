import type { TargetStatus } from '../config/survey';
import type { TargetFlags, TargetRecord } from '../targets/targetRecord';

/**
 * First match wins: publication outranks a paper in preparation, which
 * outranks completed observations. `future` never affects the status.
 */
export function classifyStatus(flags: TargetFlags): TargetStatus {
  if (flags.published) {
    return 'Published';
  }
  if (flags.inPrep) {
    return 'In prep.';
  }
  if (!flags.inPrep && !flags.published && flags.obsComplete) {
    return 'Analysis underway';
  }
  return 'Collecting data';
}

const FLAG_FILTERS: Record<TargetStatus, (t: TargetRecord) => boolean> = {
  Published: (t) => t.published,
  'In prep.': (t) => t.inPrep,
  'Analysis underway': (t) => !t.inPrep && !t.published && t.obsComplete,
  'Collecting data': (t) => t.future
};

/**
 * Alternate grouping where each category is an independent filter on the
 * flags. Groups may overlap, and a target may land in none of them.
 */
export function groupByFlags<T extends TargetRecord>(
  targets: readonly T[],
  statuses: readonly TargetStatus[]
): Map<TargetStatus, T[]> {
  const groups = new Map<TargetStatus, T[]>();
  for (const status of statuses) {
    groups.set(status, targets.filter(FLAG_FILTERS[status]));
  }
  return groups;
}

export function groupByStatus<T extends { status: TargetStatus }>(
  targets: readonly T[],
  statuses: readonly TargetStatus[]
): Map<TargetStatus, T[]> {
  const groups = new Map<TargetStatus, T[]>();
  for (const status of statuses) {
    groups.set(
      status,
      targets.filter((t) => t.status === status)
    );
  }
  return groups;
}
