/**
 * Score Aggregation Utilities
 *
 * Merges per-unit score records into one row per entity, aligned to a
 * fixed list of contest units. Entities missing from a unit get a
 * "no participation" cell that counts as 0 toward the total.
 *
 * Aggregation Rules:
 * - The unit list must be non-empty
 * - Scores must be finite, non-negative numbers
 * - An entity may appear at most once per unit
 * - All input is validated before any row is built (fail-fast)
 */

import {
  AggregatedRow,
  ContestUnit,
  NO_PARTICIPATION,
  ScoreRecord,
  ScoresByUnit,
  UnitCell,
} from '../models/score';
import { RankableRow } from '../models/leaderboard';
import {
  DuplicateEntityInUnitError,
  EmptyUnitListError,
  MalformedScoreInputError,
  UnknownContestUnitError,
} from '../models/errors';

/**
 * Per-source total fed into a combined leaderboard
 */
export interface SourceTotals {
  source: ContestUnit;
  rows: (RankableRow & { display_name: string })[];
}

/**
 * Check that a score is a finite, non-negative number
 */
export function isValidScore(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Validate the score records of every unit
 *
 * @throws UnknownContestUnitError if scores reference a unit outside the list
 * @throws MalformedScoreInputError on the first invalid score
 * @throws DuplicateEntityInUnitError if an entity appears twice in one unit
 */
export function validateUnitScores(units: ContestUnit[], scoresByUnit: ScoresByUnit): void {
  const unitIds = new Set(units.map((unit) => unit.id));

  for (const unitId of Object.keys(scoresByUnit)) {
    if (!unitIds.has(unitId)) {
      throw new UnknownContestUnitError(unitId);
    }
  }

  for (const unit of units) {
    const seen = new Set<string>();

    for (const record of unitRecords(scoresByUnit, unit.id)) {
      if (!isValidScore(record.score)) {
        throw new MalformedScoreInputError(unit.id, record.entity_key, record.score);
      }
      if (seen.has(record.entity_key)) {
        throw new DuplicateEntityInUnitError(unit.id, record.entity_key);
      }
      seen.add(record.entity_key);
    }
  }
}

/**
 * Records of one unit; only own keys count, so unit ids such as
 * "__proto__" or "constructor" never resolve to inherited members
 */
export function unitRecords(scoresByUnit: ScoresByUnit, unitId: string): ScoreRecord[] {
  return Object.prototype.hasOwnProperty.call(scoresByUnit, unitId) ? scoresByUnit[unitId] : [];
}

/**
 * Aggregate scores across contest units
 *
 * Produces one row per distinct entity key across all units, in order of
 * first appearance. Display names follow the last unit an entity appears in.
 *
 * @param units - Fixed, ordered list of contest units
 * @param scoresByUnit - Score records per unit id (a unit may be absent or empty)
 * @returns Aggregated rows, unordered by total
 * @throws EmptyUnitListError if no units are given
 */
export function aggregateUnitScores(
  units: ContestUnit[],
  scoresByUnit: ScoresByUnit
): AggregatedRow[] {
  if (units.length === 0) {
    throw new EmptyUnitListError();
  }

  validateUnitScores(units, scoresByUnit);

  const rows = new Map<string, { display_name: string; cells: UnitCell[] }>();

  for (const [index, unit] of units.entries()) {
    for (const record of unitRecords(scoresByUnit, unit.id)) {
      let row = rows.get(record.entity_key);
      if (!row) {
        row = {
          display_name: record.display_name,
          cells: units.map(() => NO_PARTICIPATION),
        };
        rows.set(record.entity_key, row);
      }

      row.display_name = record.display_name;
      row.cells[index] = toCell(record);
    }
  }

  return Array.from(rows.entries()).map(([entityKey, row]) => ({
    entity_key: entityKey,
    display_name: row.display_name,
    cells: row.cells,
    total: sumCells(row.cells),
  }));
}

/**
 * Combine independently ranked sources into one aggregate
 *
 * Each source's total stands in for one contest unit's score, so an entity
 * absent from a source counts 0 for it.
 */
export function combineSourceTotals(sources: SourceTotals[]): AggregatedRow[] {
  const scoresByUnit: ScoresByUnit = Object.fromEntries(
    sources.map(({ source, rows }): [string, ScoreRecord[]] => [
      source.id,
      rows.map((row) => ({ entity_key: row.entity_key, display_name: row.display_name, score: row.total })),
    ])
  );

  return aggregateUnitScores(
    sources.map(({ source }) => source),
    scoresByUnit
  );
}

/**
 * Sum cell scores in unit order
 */
export function sumCells(cells: UnitCell[]): number {
  let total = 0;
  for (const cell of cells) {
    total += cell.score;
  }
  return total;
}

/**
 * True when every participant of a unit scored 0 (e.g., a washed-out match)
 */
export function isWashedOut(records: ScoreRecord[]): boolean {
  return records.length > 0 && records.every((record) => record.score === 0);
}

function toCell(record: ScoreRecord): UnitCell {
  return record.selection === undefined
    ? { participated: true, score: record.score }
    : { participated: true, score: record.score, selection: record.selection };
}
