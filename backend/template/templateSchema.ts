import { z } from 'zod';

import { TEMPLATE_SCHEMA_VERSION } from './SubmissionTemplate';

const columnBase = {
  name: z.string().min(1, 'Column name must not be empty.'),
  required: z.boolean().default(false),
  description: z.string().optional(),
};

const subjectIdPolicySchema = z
  .object({
    kind: z.literal('initials').default('initials'),
    maxInitialsLength: z.number().int().positive().default(5),
    unknownValues: z.array(z.string().min(1)).default(['unknown', 'unk']),
    fullNameMinPartLength: z.number().int().positive().default(4),
  })
  .default({});

export const columnSpecSchema = z.discriminatedUnion('type', [
  z.object({
    ...columnBase,
    type: z.literal('free-text'),
    maxLength: z.number().int().positive().optional(),
  }),
  z.object({
    ...columnBase,
    type: z.literal('enumerated'),
    values: z.array(z.string()).min(1, 'Enumerated columns need at least one allowed value.'),
  }),
  z.object({
    ...columnBase,
    type: z.literal('date'),
    format: z.literal('MM/DD/YYYY').default('MM/DD/YYYY'),
  }),
  z.object({
    ...columnBase,
    type: z.literal('time'),
    format: z.literal('HH:MM').default('HH:MM'),
    acceptTwelveHour: z.boolean().default(true),
  }),
  z.object({
    ...columnBase,
    type: z.literal('subject-id'),
    policy: subjectIdPolicySchema,
  }),
  z.object({
    ...columnBase,
    type: z.literal('number'),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  }),
  z.object({
    ...columnBase,
    type: z.literal('pattern'),
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[imsu]*$/, 'Pattern flags may only use i, m, s and u.')
      .optional(),
    description: z.string().optional(),
  }),
  z.object({
    ...columnBase,
    type: z.literal('other'),
  }),
]);

const compiles = (pattern: string, flags?: string): boolean => {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
};

export const submissionTemplateSchema = z
  .object({
    schemaVersion: z.literal(TEMPLATE_SCHEMA_VERSION).default(TEMPLATE_SCHEMA_VERSION),
    templateId: z.string().min(1).default('default'),
    templateVersion: z.string().min(1).default('unversioned'),
    title: z.string().optional(),
    columns: z.array(columnSpecSchema).min(1, 'Template must declare at least one column.'),
  })
  .superRefine((template, ctx) => {
    const seen = new Set<string>();
    template.columns.forEach((column, index) => {
      if (seen.has(column.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index, 'name'],
          message: `Duplicate column name: "${column.name}".`,
        });
      }
      seen.add(column.name);

      if (column.type === 'pattern' && !compiles(column.pattern, column.flags)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index, 'pattern'],
          message: `Invalid regular expression: ${column.pattern}`,
        });
      }

      if (
        column.type === 'number' &&
        column.min !== undefined &&
        column.max !== undefined &&
        column.min > column.max
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index],
          message: `min (${column.min}) must not exceed max (${column.max}).`,
        });
      }
    });
  });

export type SubmissionTemplateInput = z.input<typeof submissionTemplateSchema>;
