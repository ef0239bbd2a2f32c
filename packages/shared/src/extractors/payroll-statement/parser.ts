/**
 * Payroll Statement Parser
 *
 * Splits statement text into one segment per employee/role and reads the
 * identity, summary amounts and concept lines of each segment.
 */

import type { ParseWarning } from '../../errors';
import { mapMonetaryFields } from '../../fields';
import { logger } from '../../logger';
import type { ConceptLine, RawEmployeeBlock } from '../../types';
import {
  compilePayrollPatterns,
  isConceptKind,
  parseAmountToCents,
  type PayrollPatternSet,
} from './patterns';

export type Segmentation = 'header' | 'separator';

export interface ParseOutcome {
  blocks: RawEmployeeBlock[];
  skipped_blocks: number;
  warnings: ParseWarning[];
  segmentation: Segmentation;
}

let defaultPatterns: PayrollPatternSet | null = null;

function getDefaultPatterns(): PayrollPatternSet {
  if (!defaultPatterns) {
    defaultPatterns = compilePayrollPatterns();
  }
  return defaultPatterns;
}

/**
 * Normalize line endings and non-breaking spaces left by the exporters
 */
export function cleanStatementText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\u00A0/g, ' ')
    .replace(/[−–—]/g, '-');
}

/**
 * Split text into candidate employee segments, in document order.
 *
 * Entries normally open with an "Id. Hr:" header. Exports without that
 * header separate entries with a line of underscores; there a segment is
 * a candidate only when it carries the name label. Text before the first
 * header (the statement preamble) is never a candidate.
 */
export function splitIntoSegments(
  text: string,
  patterns: PayrollPatternSet = getDefaultPatterns()
): { segments: string[]; segmentation: Segmentation } {
  if (patterns.blockStart.test(text)) {
    const segments = text
      .split(patterns.blockStart)
      .filter((segment) => patterns.blockHeader.test(segment));
    return { segments, segmentation: 'header' };
  }

  const segments = text
    .split(patterns.blockSeparator)
    .filter((segment) => patterns.nameLabel.test(segment));
  return { segments, segmentation: 'separator' };
}

function matchGroup(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  return match ? match[1] : null;
}

function extractConcepts(segment: string, patterns: PayrollPatternSet): ConceptLine[] {
  const concepts: ConceptLine[] = [];
  for (const match of segment.matchAll(patterns.concept)) {
    const [, kind, code, label, amount] = match;
    if (!isConceptKind(kind)) continue;
    concepts.push({
      kind,
      code,
      label: label.trim(),
      amount: parseAmountToCents(amount) ?? 0,
    });
  }
  return concepts;
}

/**
 * Parse one candidate segment. Returns null when no name can be read,
 * since such a block cannot be consolidated.
 */
export function parseBlock(
  segment: string,
  sourceDocument: string,
  blockIndex: number,
  patterns: PayrollPatternSet = getDefaultPatterns()
): RawEmployeeBlock | null {
  const name = matchGroup(patterns.name, segment)?.trim() ?? '';
  if (!name) {
    return null;
  }

  // An absent line item is a zero amount, not a failed block
  const amounts = mapMonetaryFields((field) => {
    const { pattern, normalize } = patterns.monetary[field];
    const raw = matchGroup(pattern, segment);
    return raw === null ? 0 : normalize(raw) ?? 0;
  });

  return {
    name,
    amounts,
    hr_id: matchGroup(patterns.identity.hr_id, segment) ?? '',
    position_code: matchGroup(patterns.identity.position_code, segment) ?? '',
    role_code: matchGroup(patterns.identity.role_code, segment) ?? '',
    days_worked: matchGroup(patterns.identity.days_worked, segment) ?? '',
    hire_date: matchGroup(patterns.identity.hire_date, segment) ?? '',
    concepts: extractConcepts(segment, patterns),
    source_document: sourceDocument,
    block_index: blockIndex,
  };
}

function excerpt(segment: string): string {
  return segment.replace(/\s+/g, ' ').trim().slice(0, 80);
}

/**
 * Parse a whole statement into raw employee blocks, in document order.
 */
export function parsePayrollStatement(
  text: string,
  sourceDocument: string,
  patterns: PayrollPatternSet = getDefaultPatterns()
): ParseOutcome {
  const { segments, segmentation } = splitIntoSegments(cleanStatementText(text), patterns);

  const blocks: RawEmployeeBlock[] = [];
  const warnings: ParseWarning[] = [];

  segments.forEach((segment, blockIndex) => {
    const block = parseBlock(segment, sourceDocument, blockIndex, patterns);
    if (block) {
      blocks.push(block);
    } else {
      warnings.push({
        kind: 'missing_name',
        document: sourceDocument,
        block_index: blockIndex,
        excerpt: excerpt(segment),
      });
    }
  });

  for (const warning of warnings) {
    logger.warn('Dropped block without employee name', {
      document: warning.document,
      block_index: warning.block_index,
      excerpt: warning.excerpt,
    });
  }

  logger.info('Parsed payroll statement', {
    document: sourceDocument,
    segmentation,
    candidate_blocks: segments.length,
    blocks: blocks.length,
    skipped_blocks: warnings.length,
  });

  return {
    blocks,
    skipped_blocks: warnings.length,
    warnings,
    segmentation,
  };
}
