import type { SubjectIdPolicy } from '../template/SubmissionTemplate';
import type { FindingRuleId, SubjectIdIssueKind } from './ValidationFinding';

export type SubjectIdAssessment = {
  kind: SubjectIdIssueKind;
  ruleId: Extract<FindingRuleId, `SUBJECT_ID_${string}`>;
  message: string;
};

const NAME_WORD = /^[A-Za-z][A-Za-z'.-]*$/;
const CAPITALISED_WORD = /^[A-Z][a-z]+$/;
const INITIALS = /^(?=.*[A-Za-z])[A-Za-z.]+$/;

const letterCount = (word: string) => word.replace(/[^A-Za-z]/g, '').length;

export const isUnknownPlaceholder = (value: string, policy: SubjectIdPolicy): boolean => {
  const lower = value.toLowerCase();
  return policy.unknownValues.some((u) => u.toLowerCase() === lower);
};

/**
 * Two or more alphabetic words where either one word is long enough to be a
 * name, or at least two words are Capitalised ("Jo Li"). Commas and
 * semicolons separate words too, so "Smith, John" counts.
 */
export const looksLikeFullName = (value: string, policy: SubjectIdPolicy): boolean => {
  const words = value.split(/[\s,;]+/).filter((w) => w !== '');
  if (words.length < 2 || !words.every((w) => NAME_WORD.test(w))) return false;
  if (words.some((w) => letterCount(w) >= policy.fullNameMinPartLength)) return true;
  return words.filter((w) => CAPITALISED_WORD.test(w)).length >= 2;
};

export const isInitials = (value: string, policy: SubjectIdPolicy): boolean =>
  value.length <= policy.maxInitialsLength && INITIALS.test(value);

/**
 * Classify a non-empty, trimmed subject identifier. `null` means it is
 * acceptable initials.
 */
export function assessSubjectId(
  value: string,
  policy: SubjectIdPolicy,
): SubjectIdAssessment | null {
  if (isUnknownPlaceholder(value, policy)) {
    return {
      kind: 'unknown',
      ruleId: 'SUBJECT_ID_UNKNOWN',
      message: 'Subject ID should not be "unknown".',
    };
  }

  if (looksLikeFullName(value, policy)) {
    return {
      kind: 'full-name',
      ruleId: 'SUBJECT_ID_FULL_NAME',
      message: 'Subject ID appears to be a full name. Use initials instead.',
    };
  }

  if (!isInitials(value, policy)) {
    return {
      kind: 'invalid',
      ruleId: 'SUBJECT_ID_INVALID',
      message: 'Subject ID must be initials (e.g., "JD", "J.D.").',
    };
  }

  return null;
}
