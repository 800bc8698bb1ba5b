/*
 * Submission template (v1).
 *
 * A template is the complete ruleset for one kind of CSV submission: the
 * ordered columns a file must carry and how each column's cells are checked.
 * Templates are immutable values; replacing the rules means loading a new one.
 */

export type TemplateSchemaVersion = 'submission-template/1';

export const TEMPLATE_SCHEMA_VERSION: TemplateSchemaVersion = 'submission-template/1';

export const COLUMN_TYPES = [
  'free-text',
  'enumerated',
  'date',
  'time',
  'subject-id',
  'number',
  'pattern',
  'other',
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export type DateFormat = 'MM/DD/YYYY';
export type TimeFormat = 'HH:MM';

export type SubjectIdPolicy = {
  kind: 'initials';
  /** Longest accepted run of letters and periods, e.g. 5 accepts "J.D.S". */
  maxInitialsLength: number;
  /** Placeholder values that stand in for a missing identifier (case-insensitive). */
  unknownValues: readonly string[];
  /** A multi-word value is read as a name once any word has this many letters. */
  fullNameMinPartLength: number;
};

type ColumnSpecBase = {
  /** Exact header text; case- and whitespace-sensitive. */
  name: string;
  required: boolean;
  description?: string;
};

export type FreeTextColumnSpec = ColumnSpecBase & {
  type: 'free-text';
  maxLength?: number;
};

export type EnumeratedColumnSpec = ColumnSpecBase & {
  type: 'enumerated';
  values: readonly string[];
};

export type DateColumnSpec = ColumnSpecBase & {
  type: 'date';
  format: DateFormat;
};

export type TimeColumnSpec = ColumnSpecBase & {
  type: 'time';
  format: TimeFormat;
  /** Also accept "H:MM AM/PM" style input. */
  acceptTwelveHour: boolean;
};

export type SubjectIdColumnSpec = ColumnSpecBase & {
  type: 'subject-id';
  policy: SubjectIdPolicy;
};

export type NumberColumnSpec = ColumnSpecBase & {
  type: 'number';
  min?: number;
  max?: number;
};

export type PatternColumnSpec = ColumnSpecBase & {
  type: 'pattern';
  pattern: string;
  flags?: string;
  /** Shown as the finding message when the pattern does not match. */
  description?: string;
};

export type OtherColumnSpec = ColumnSpecBase & {
  type: 'other';
};

export type ColumnSpec =
  | FreeTextColumnSpec
  | EnumeratedColumnSpec
  | DateColumnSpec
  | TimeColumnSpec
  | SubjectIdColumnSpec
  | NumberColumnSpec
  | PatternColumnSpec
  | OtherColumnSpec;

export type SubmissionTemplate = {
  schemaVersion: TemplateSchemaVersion;
  templateId: string;
  templateVersion: string;
  title?: string;
  /** Ordered; this order drives finding order in every report. */
  columns: readonly ColumnSpec[];
};

export type TemplateDescription = {
  templateId: string;
  templateVersion: string;
  columnCount: number;
  requiredCount: number;
  columnsByType: Partial<Record<ColumnType, number>>;
};
