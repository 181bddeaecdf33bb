import type { CleanCatalogRow } from '../catalog/catalogRow';
import type { SurveyConfig, TargetStatus } from '../config/survey';
import { logWarn } from '../observability/logger';
import { recordUnmatchedTargets } from '../observability/metrics';
import type { TargetRecord } from '../targets/targetRecord';
import { classifyStatus } from './classifier';
import { naturalSortBy } from './naturalSort';

export type ClassifiedTarget = TargetRecord &
  CleanCatalogRow & {
    status: TargetStatus;
  };

export interface JoinResult {
  targets: ClassifiedTarget[];
  /** Target names with no cleaned catalog row, in file order. */
  unmatched: string[];
}

/**
 * Left-joins the target list onto the cleaned catalog by planet name.
 * A target with several catalog rows yields one row per catalog row; a
 * target with none yields nothing and is reported in `unmatched`.
 */
export function joinTargets(
  catalog: readonly CleanCatalogRow[],
  targets: readonly TargetRecord[],
  config: SurveyConfig
): JoinResult {
  const wanted = new Set(targets.map((t) => t.planetName));
  const rowsByName = new Map<string, CleanCatalogRow[]>();
  for (const row of catalog) {
    if (!wanted.has(row.name)) continue;
    const rows = rowsByName.get(row.name) ?? [];
    rows.push(row);
    rowsByName.set(row.name, rows);
  }

  const known = new Set<TargetStatus>(config.categories.map((c) => c.status));
  const joined: ClassifiedTarget[] = [];
  const unmatched: string[] = [];

  for (const target of targets) {
    const rows = rowsByName.get(target.planetName);
    if (!rows) {
      if (!unmatched.includes(target.planetName)) {
        unmatched.push(target.planetName);
      }
      continue;
    }
    const status = classifyStatus(target);
    if (!known.has(status)) {
      throw new Error(`Status "${status}" is not part of the configured categories`);
    }
    for (const row of rows) {
      joined.push({ ...target, ...row, status });
    }
  }

  recordUnmatchedTargets(unmatched.length);
  if (unmatched.length) {
    logWarn('targets_unmatched', { count: unmatched.length, names: unmatched });
  }

  return {
    targets: naturalSortBy(joined, (t) => t.planetName),
    unmatched
  };
}
