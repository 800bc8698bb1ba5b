import type { FindingRuleId, ValidationFinding } from './ValidationFinding';

export type FindingCategory =
  | 'Header Issues'
  | 'Structural Issues'
  | 'Missing Values'
  | 'Date Format Issues'
  | 'Time Format Issues'
  | 'Invalid Dropdown Values'
  | 'Subject ID Issues'
  | 'Other Validation Issues';

export type FindingCategoryGroup = {
  category: FindingCategory;
  count: number;
  /** First offending value seen for the category. */
  example: string;
  fix: string;
};

const CATEGORY_ORDER: readonly FindingCategory[] = [
  'Header Issues',
  'Structural Issues',
  'Missing Values',
  'Date Format Issues',
  'Time Format Issues',
  'Invalid Dropdown Values',
  'Subject ID Issues',
  'Other Validation Issues',
];

const FIX_BY_CATEGORY: Record<FindingCategory, string> = {
  'Header Issues': 'Copy the exact header names from the template into the first row.',
  'Structural Issues': 'Make every row carry one value per header; check for stray commas or quotes.',
  'Missing Values': 'Fill in every required column.',
  'Date Format Issues': 'Use format MM/DD/YYYY (e.g., 09/23/2025).',
  'Time Format Issues': 'Use format HH:MM (e.g., 08:21).',
  'Invalid Dropdown Values': 'Use the exact value from the dropdown list.',
  'Subject ID Issues': 'Use initials only (e.g., "JD", "J.D.").',
  'Other Validation Issues': 'Check the column requirements in the template.',
};

export const categoryForRule = (ruleId: FindingRuleId): FindingCategory => {
  switch (ruleId) {
    case 'MISSING_HEADER':
    case 'DUPLICATE_HEADER':
      return 'Header Issues';
    case 'ROW_FIELD_COUNT':
      return 'Structural Issues';
    case 'REQUIRED_EMPTY':
      return 'Missing Values';
    case 'INVALID_DATE':
      return 'Date Format Issues';
    case 'INVALID_TIME':
      return 'Time Format Issues';
    case 'INVALID_ENUM':
      return 'Invalid Dropdown Values';
    case 'SUBJECT_ID_UNKNOWN':
    case 'SUBJECT_ID_FULL_NAME':
    case 'SUBJECT_ID_INVALID':
      return 'Subject ID Issues';
    default:
      return 'Other Validation Issues';
  }
};

/**
 * Count findings per category, in a fixed category order. Empty categories
 * are left out.
 */
export function groupFindingsByCategory(
  findings: readonly ValidationFinding[],
): FindingCategoryGroup[] {
  const groups = new Map<FindingCategory, FindingCategoryGroup>();

  for (const finding of findings) {
    const category = categoryForRule(finding.ruleId);
    const group = groups.get(category);
    if (group) {
      group.count += 1;
    } else {
      groups.set(category, {
        category,
        count: 1,
        example: finding.currentValue,
        fix: FIX_BY_CATEGORY[category],
      });
    }
  }

  return CATEGORY_ORDER.flatMap((category) => {
    const group = groups.get(category);
    return group ? [group] : [];
  });
}

export type ColumnIssueGroup = FindingCategoryGroup & {
  /** Empty for row-level findings. */
  column: string;
};

/**
 * Count findings per column and category, most frequent first. Ties keep
 * the order in which each group was first seen.
 */
export function groupFindingsByColumnIssue(
  findings: readonly ValidationFinding[],
): ColumnIssueGroup[] {
  const groups = new Map<string, ColumnIssueGroup>();

  for (const finding of findings) {
    const category = categoryForRule(finding.ruleId);
    const key = JSON.stringify([finding.column, category]);
    const group = groups.get(key);
    if (group) {
      group.count += 1;
    } else {
      groups.set(key, {
        column: finding.column,
        category,
        count: 1,
        example: finding.currentValue,
        fix: FIX_BY_CATEGORY[category],
      });
    }
  }

  return Array.from(groups.values()).sort((a, b) => b.count - a.count);
}
