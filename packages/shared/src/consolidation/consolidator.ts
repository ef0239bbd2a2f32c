/**
 * Employee Consolidation
 *
 * Folds raw blocks into one record per employee. The fold threads an
 * immutable accumulator keyed by normalized name; Map insertion order is
 * the first-seen order of each key.
 */

import { addAmounts } from '../fields';
import { logger } from '../logger';
import type {
  ConceptLine,
  ConceptTotal,
  ConsolidatedEmployee,
  Ordering,
  RawEmployeeBlock,
} from '../types';

export interface ConsolidationState {
  readonly employees: ReadonlyMap<string, ConsolidatedEmployee>;
  readonly blocksFolded: number;
}

export const emptyConsolidation: ConsolidationState = {
  employees: new Map(),
  blocksFolded: 0,
};

/**
 * Merge key: NFC, trimmed, inner whitespace collapsed, lower-cased.
 * Never shown to users.
 */
export function normalizeEmployeeName(name: string): string {
  return name.normalize('NFC').trim().replace(/\s+/g, ' ').toLowerCase();
}

export function conceptKey(concept: Pick<ConceptLine, 'kind' | 'code' | 'label'>): string {
  return `${concept.kind} ${concept.code} ${concept.label}`;
}

function mergeConcepts(
  base: readonly ConceptTotal[],
  extra: readonly ConceptTotal[]
): ConceptTotal[] {
  const byKey = new Map<string, ConceptTotal>(base.map((c) => [c.key, c]));
  for (const concept of extra) {
    const existing = byKey.get(concept.key);
    byKey.set(
      concept.key,
      existing ? { ...existing, amount: existing.amount + concept.amount } : concept
    );
  }
  return [...byKey.values()];
}

function unionInOrder(base: readonly string[], extra: readonly string[]): string[] {
  const merged = [...base];
  for (const value of extra) {
    if (!merged.includes(value)) merged.push(value);
  }
  return merged;
}

/**
 * A single block seen as a one-block employee record
 */
export function employeeFromBlock(block: RawEmployeeBlock): ConsolidatedEmployee {
  const concepts = mergeConcepts(
    [],
    block.concepts.map((c) => ({
      key: conceptKey(c),
      kind: c.kind,
      code: c.code,
      label: c.label,
      amount: c.amount,
    }))
  );

  return {
    normalized_name: normalizeEmployeeName(block.name),
    display_name: block.name,
    amounts: { ...block.amounts },
    block_count: 1,
    source_documents: [block.source_document],
    hr_ids: block.hr_id ? [block.hr_id] : [],
    concepts,
  };
}

/**
 * Field-wise merge. The earlier record keeps its display name.
 */
export function mergeEmployees(
  earlier: ConsolidatedEmployee,
  later: ConsolidatedEmployee
): ConsolidatedEmployee {
  return {
    normalized_name: earlier.normalized_name,
    display_name: earlier.display_name,
    amounts: addAmounts(earlier.amounts, later.amounts),
    block_count: earlier.block_count + later.block_count,
    source_documents: unionInOrder(earlier.source_documents, later.source_documents),
    hr_ids: unionInOrder(earlier.hr_ids, later.hr_ids),
    concepts: mergeConcepts(earlier.concepts, later.concepts),
  };
}

export function foldEmployee(
  state: ConsolidationState,
  employee: ConsolidatedEmployee
): ConsolidationState {
  const employees = new Map(state.employees);
  const existing = employees.get(employee.normalized_name);
  employees.set(
    employee.normalized_name,
    existing ? mergeEmployees(existing, employee) : employee
  );
  return { employees, blocksFolded: state.blocksFolded + employee.block_count };
}

export function foldBlock(state: ConsolidationState, block: RawEmployeeBlock): ConsolidationState {
  return foldEmployee(state, employeeFromBlock(block));
}

/**
 * Consolidated records in first-seen order of their key
 */
export function finishConsolidation(state: ConsolidationState): ConsolidatedEmployee[] {
  return [...state.employees.values()];
}

export function consolidate(blocks: readonly RawEmployeeBlock[]): ConsolidatedEmployee[] {
  const state = blocks.reduce(foldBlock, emptyConsolidation);
  const employees = finishConsolidation(state);

  logger.info('Consolidated blocks', {
    blocks: blocks.length,
    employees: employees.length,
  });

  return employees;
}

/**
 * Consolidate records that are already consolidated, each treated as a
 * singleton block carrying its own block count.
 */
export function reconsolidate(
  employees: readonly ConsolidatedEmployee[]
): ConsolidatedEmployee[] {
  return finishConsolidation(employees.reduce(foldEmployee, emptyConsolidation));
}

const collator = new Intl.Collator('es', { sensitivity: 'base' });

/**
 * Order consolidated records. 'original' keeps first-seen order;
 * 'alphabetical' compares display names, then merge keys.
 */
export function orderEmployees(
  employees: readonly ConsolidatedEmployee[],
  ordering: Ordering
): ConsolidatedEmployee[] {
  if (ordering === 'original') {
    return [...employees];
  }

  return employees
    .map((employee, index) => ({ employee, index }))
    .sort((a, b) => {
      const byName = collator.compare(a.employee.display_name, b.employee.display_name);
      if (byName !== 0) return byName;
      if (a.employee.normalized_name !== b.employee.normalized_name) {
        return a.employee.normalized_name < b.employee.normalized_name ? -1 : 1;
      }
      return a.index - b.index;
    })
    .map(({ employee }) => employee);
}
