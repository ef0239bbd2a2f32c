/**
 * Payroll Statement Extractor
 *
 * Pattern-based extraction for provincial payroll statements.
 */

export {
  PATTERN_VERSION,
  MONETARY_FIELD_SOURCES,
  compilePayrollPatterns,
  parseAmountToCents,
  parseArgentineAmount,
  centsToDecimal,
  type PayrollPatternSet,
  type MonetaryFieldPattern,
  type AmountNormalizer,
  type IdentityFieldId,
} from './patterns';

export {
  cleanStatementText,
  splitIntoSegments,
  parseBlock,
  parsePayrollStatement,
  type ParseOutcome,
  type Segmentation,
} from './parser';
