/**
 * Payroll Statement Extraction Patterns
 *
 * Regular expressions and normalizers for the provincial payroll statement
 * ("liquidación de haberes"). Every employee/role entry starts with an
 * "Id. Hr:" header and carries a summary of amounts:
 *
 *   Id. Hr: 20456 Cargo: 1203 Rol: 2 Dias Trab: 30 Fecha Alta: 01/03/2011
 *   Apellido y Nombre: PEREZ JUAN CARLOS Centro Pago: 114
 *   DV 100 Sueldo Basico 180.250,00
 *   DV 512 Complemento Remunerativo 12.400,50
 *   RT 700 Aporte Jubilatorio 32.445,00
 *   Rem c/ Aporte 216.881,97 Rem s/ Aporte 1.626,61
 *   Liq. Pesos: 138.784,57
 *
 * Amounts use the Argentine locale: "." groups thousands, "," is decimal.
 */

import { mapMonetaryFields } from '../../fields';
import type { Cents, ConceptKind, MonetaryFieldId } from '../../types';

/**
 * Pattern version for tracking
 */
export const PATTERN_VERSION = '1.0.0';

/**
 * A printed amount: optional sign or "$", digits grouped with ".",
 * two decimals after ",", optional trailing minus.
 * Examples: 216.881,97  -1.626,61  $ 12.400,50  450,00-
 */
const AMOUNT = String.raw`(\(?[-+]?\s*\$?\s*\d[\d.]*,\d{2}\)?-?)`;

/**
 * Header marker that opens every employee/role entry
 */
export const BLOCK_START_SOURCE = String.raw`Id\.\s*Hr:`;

/**
 * Separator line used by older exports (100+ underscores)
 */
export const BLOCK_SEPARATOR_SOURCE = String.raw`^[ \t]*_{100,}[ \t]*$`;

/**
 * Label that marks a segment as an employee entry even without the header
 */
export const NAME_LABEL_SOURCE = String.raw`Apellido\s+y\s+Nombre\s*:`;

export type AmountNormalizer = (raw: string) => Cents | null;

export interface MonetaryFieldPattern {
  readonly pattern: RegExp;
  readonly normalize: AmountNormalizer;
}

export type IdentityFieldId = 'hr_id' | 'position_code' | 'role_code' | 'days_worked' | 'hire_date';

/**
 * Compiled pattern set. Built once per pipeline run and shared by every
 * block of every document in that run.
 */
export interface PayrollPatternSet {
  readonly version: string;
  readonly blockStart: RegExp;
  readonly blockHeader: RegExp;
  readonly blockSeparator: RegExp;
  readonly nameLabel: RegExp;
  readonly name: RegExp;
  readonly identity: Readonly<Record<IdentityFieldId, RegExp>>;
  readonly monetary: Readonly<Record<MonetaryFieldId, MonetaryFieldPattern>>;
  readonly concept: RegExp;
}

/**
 * Convert an Argentine-formatted amount to integer cents.
 *
 * '1.234.567,89' -> 123456789
 * '-450,00' / '450,00-' / '(450,00)' -> -45000
 *
 * Returns null when the text holds no parsable number.
 */
export function parseAmountToCents(raw: string): Cents | null {
  let s = raw.replace(/\s+/g, '').replace(/\$/g, '');
  if (!s) return null;

  let negative = false;
  if (/^\(.*\)$/.test(s)) {
    negative = true;
    s = s.slice(1, -1);
  }
  if (s.endsWith('-')) {
    negative = !negative;
    s = s.slice(0, -1);
  }
  if (s.startsWith('-')) {
    negative = !negative;
    s = s.slice(1);
  } else if (s.startsWith('+')) {
    s = s.slice(1);
  }

  let intPart: string;
  let decPart: string;

  const commaIndex = s.lastIndexOf(',');
  if (commaIndex !== -1) {
    intPart = s.slice(0, commaIndex).replace(/\./g, '');
    decPart = s.slice(commaIndex + 1);
  } else if (/^\d{1,3}(\.\d{3})+$/.test(s)) {
    // Thousands grouping only: 12.345
    intPart = s.replace(/\./g, '');
    decPart = '';
  } else if (/^\d+\.\d{1,2}$/.test(s)) {
    [intPart, decPart] = s.split('.');
  } else {
    intPart = s;
    decPart = '';
  }

  if (!/^\d+$/.test(intPart) || !/^\d{0,2}$/.test(decPart)) {
    return null;
  }

  const cents = parseInt(intPart, 10) * 100 + parseInt(decPart.padEnd(2, '0'), 10);
  if (!Number.isSafeInteger(cents)) return null;
  return negative && cents !== 0 ? -cents : cents;
}

/**
 * Canonical decimal value of an amount in cents.
 */
export function centsToDecimal(cents: Cents): number {
  return cents / 100;
}

/**
 * Convert an Argentine-formatted amount to its decimal value.
 * '1.234.567,89' -> 1234567.89
 */
export function parseArgentineAmount(raw: string): number | null {
  const cents = parseAmountToCents(raw);
  return cents === null ? null : centsToDecimal(cents);
}

/**
 * Declarative monetary field table: label pattern followed by an amount.
 * Adding a field means adding a row here and an id in the field registry.
 */
export const MONETARY_FIELD_SOURCES: Readonly<Record<MonetaryFieldId, string>> = {
  remuneration_with_contribution: String.raw`Rem\.?\s*c\s*/\s*Aporte\s*:?\s*` + AMOUNT,
  remuneration_without_contribution: String.raw`Rem\.?\s*s\s*/\s*Aporte\s*:?\s*` + AMOUNT,
  net_payable: String.raw`Liq\.\s*Pesos\s*:\s*` + AMOUNT,
  remunerative_supplement: String.raw`Complemento\s+Remunerativo[ \t]+` + AMOUNT,
  health_fund_adjustment: String.raw`Ajuste\s+Dif[^\n]*?APROSS[ \t]+` + AMOUNT,
  family_health_fund_deduction: String.raw`Descuento\s+APROSS[^\n]*?Voluntar\S*[ \t]+` + AMOUNT,
};

const IDENTITY_FIELD_SOURCES: Readonly<Record<IdentityFieldId, string>> = {
  hr_id: String.raw`Id\.\s*Hr:\s*(\d+)`,
  position_code: String.raw`Cargo:\s*(\d+)`,
  role_code: String.raw`Rol:\s*(\d+)`,
  days_worked: String.raw`Dias\s+Trab:\s*(\d+)`,
  hire_date: String.raw`Fecha\s+Alta:\s*([\d/]+)`,
};

/**
 * Name sits between its label and "Centro Pago" (or the end of the line)
 */
const NAME_SOURCE = String.raw`Apellido\s+y\s+Nombre\s*:[ \t]*([^\n]*?)[ \t]*(?:Centro\s+Pago|$)`;

/**
 * Itemised concept line: "DV 100 Sueldo Basico 180.250,00"
 */
const CONCEPT_SOURCE = String.raw`^[ \t]*(DV|RT)[ \t]+(\d+)[ \t]+(.+?)[ \t]+` + AMOUNT + String.raw`[ \t]*$`;

export function compilePayrollPatterns(): PayrollPatternSet {
  return {
    version: PATTERN_VERSION,
    blockStart: new RegExp(`(?=${BLOCK_START_SOURCE})`),
    blockHeader: new RegExp(`^${BLOCK_START_SOURCE}`),
    blockSeparator: new RegExp(BLOCK_SEPARATOR_SOURCE, 'm'),
    nameLabel: new RegExp(NAME_LABEL_SOURCE),
    name: new RegExp(NAME_SOURCE, 'm'),
    identity: {
      hr_id: new RegExp(IDENTITY_FIELD_SOURCES.hr_id),
      position_code: new RegExp(IDENTITY_FIELD_SOURCES.position_code),
      role_code: new RegExp(IDENTITY_FIELD_SOURCES.role_code),
      days_worked: new RegExp(IDENTITY_FIELD_SOURCES.days_worked),
      hire_date: new RegExp(IDENTITY_FIELD_SOURCES.hire_date),
    },
    monetary: mapMonetaryFields((field) => ({
      pattern: new RegExp(MONETARY_FIELD_SOURCES[field]),
      normalize: parseAmountToCents,
    })),
    concept: new RegExp(CONCEPT_SOURCE, 'gm'),
  };
}

export function isConceptKind(value: string): value is ConceptKind {
  return value === 'DV' || value === 'RT';
}
