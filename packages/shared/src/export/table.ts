/**
 * Table Projection
 *
 * Applies the field selection to consolidated records. Runs after
 * consolidation, so the selection never changes what gets merged.
 */

import { centsToDecimal } from '../extractors/payroll-statement';
import { FIELD_LABELS, MONETARY_FIELDS, isMonetaryField } from '../fields';
import type {
  ConsolidatedEmployee,
  FieldId,
  MonetaryAmounts,
  MonetaryFieldId,
  ResultTable,
  TableRow,
  TableTotals,
} from '../types';

export function selectedMonetaryFields(selection: readonly FieldId[]): MonetaryFieldId[] {
  return selection.filter(isMonetaryField);
}

/**
 * Sum (cents) of each selected monetary field over all employees
 */
export function computeGrandTotals(
  employees: readonly ConsolidatedEmployee[],
  selection: readonly FieldId[]
): Partial<MonetaryAmounts> {
  const totals: Partial<MonetaryAmounts> = {};
  for (const field of selectedMonetaryFields(selection)) {
    totals[field] = employees.reduce((sum, e) => sum + e.amounts[field], 0);
  }
  return totals;
}

/**
 * Name plus every monetary field holding a non-zero value somewhere
 */
export function availableFields(employees: readonly ConsolidatedEmployee[]): FieldId[] {
  const fields: FieldId[] = ['name'];
  for (const field of MONETARY_FIELDS) {
    if (employees.some((e) => e.amounts[field] !== 0)) {
      fields.push(field);
    }
  }
  return fields;
}

export function projectTable(
  employees: readonly ConsolidatedEmployee[],
  selection: readonly FieldId[],
  grandTotals: Partial<MonetaryAmounts>
): ResultTable {
  const columns = selection.map((field) => ({ field, label: FIELD_LABELS[field] }));

  const rows = employees.map((employee) => {
    const row: TableRow = {};
    for (const field of selection) {
      if (isMonetaryField(field)) {
        row[field] = centsToDecimal(employee.amounts[field]);
      } else {
        row.name = employee.display_name;
      }
    }
    return row;
  });

  const totals: TableTotals = {};
  for (const field of selectedMonetaryFields(selection)) {
    totals[field] = centsToDecimal(grandTotals[field] ?? 0);
  }

  return { columns, rows, totals };
}
