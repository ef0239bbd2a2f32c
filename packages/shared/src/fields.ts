/**
 * Field Registry
 *
 * Recognized field identifiers, their display labels and the rules for
 * resolving a caller's field selection.
 */

import { FieldSelectionError } from './errors';
import type { FieldId, MonetaryAmounts, MonetaryFieldId, Ordering } from './types';

/**
 * Monetary fields in canonical column order.
 */
export const MONETARY_FIELDS = [
  'remuneration_with_contribution',
  'remuneration_without_contribution',
  'net_payable',
  'remunerative_supplement',
  'health_fund_adjustment',
  'family_health_fund_deduction',
] as const;

export const FIELD_IDS: readonly FieldId[] = ['name', ...MONETARY_FIELDS];

export const FIELD_LABELS: Record<FieldId, string> = {
  name: 'Apellido y Nombre',
  remuneration_with_contribution: 'Rem c/ Aporte',
  remuneration_without_contribution: 'Rem s/ Aporte',
  net_payable: 'Líquido',
  remunerative_supplement: 'Complemento Remunerativo',
  health_fund_adjustment: 'Ajuste Dif. Aporte Mínimo APROSS',
  family_health_fund_deduction: 'Descuento APROSS por afiliados Familiares Voluntar',
};

export const ORDERINGS: readonly Ordering[] = ['original', 'alphabetical'];

export function isFieldId(value: string): value is FieldId {
  return FIELD_IDS.some((field) => field === value);
}

export function isMonetaryField(field: FieldId): field is MonetaryFieldId {
  return field !== 'name';
}

export function isOrdering(value: string): value is Ordering {
  return ORDERINGS.some((ordering) => ordering === value);
}

/**
 * Build a value for every monetary field, in canonical order.
 */
export function mapMonetaryFields<T>(fn: (field: MonetaryFieldId) => T): Record<MonetaryFieldId, T> {
  return {
    remuneration_with_contribution: fn('remuneration_with_contribution'),
    remuneration_without_contribution: fn('remuneration_without_contribution'),
    net_payable: fn('net_payable'),
    remunerative_supplement: fn('remunerative_supplement'),
    health_fund_adjustment: fn('health_fund_adjustment'),
    family_health_fund_deduction: fn('family_health_fund_deduction'),
  };
}

/**
 * All-zero amounts, the value of a block whose line items are all absent.
 */
export function zeroAmounts(): MonetaryAmounts {
  return mapMonetaryFields(() => 0);
}

export function addAmounts(
  a: Readonly<MonetaryAmounts>,
  b: Readonly<MonetaryAmounts>
): MonetaryAmounts {
  return mapMonetaryFields((field) => a[field] + b[field]);
}

/**
 * Resolve a requested field selection into known field ids.
 * Duplicates keep their first position; an empty or missing selection
 * means every field in canonical order.
 */
export function resolveFieldSelection(requested?: readonly string[]): FieldId[] {
  if (!requested || requested.length === 0) {
    return [...FIELD_IDS];
  }

  const unknown = requested.filter((f) => !isFieldId(f));
  if (unknown.length > 0) {
    throw new FieldSelectionError(
      `Unknown field(s): ${unknown.join(', ')}. Recognized fields: ${FIELD_IDS.join(', ')}`
    );
  }

  const selection: FieldId[] = [];
  for (const field of requested) {
    if (isFieldId(field) && !selection.includes(field)) {
      selection.push(field);
    }
  }
  return selection;
}

export function resolveOrdering(requested: string | undefined, fallback: Ordering): Ordering {
  if (requested === undefined) return fallback;
  if (!isOrdering(requested)) {
    throw new FieldSelectionError(
      `Unknown ordering "${requested}". Expected one of: ${ORDERINGS.join(', ')}`
    );
  }
  return requested;
}
