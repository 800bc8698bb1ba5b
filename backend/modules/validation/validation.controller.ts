// ─── Validation Controller ────────────────────────────────────────────────
// Express request handlers for the interactive validator.

import type { Request, Response } from 'express';
import { z } from 'zod';

import { mapErrorToApiResponse } from '../../reliability/FailureHandling';
import { ValidatorError } from '../../reliability/ValidatorError';
import { telemetryStore } from '../../telemetry/TelemetryStore';
import { loadTemplate } from '../../template/TemplateLoader';
import {
  getActiveTemplate,
  resetActiveTemplate,
  setActiveTemplate,
} from './activeTemplateStore';
import { validateSubmission } from './validation.service';

const DEFAULT_FILE_NAME = 'submission.csv';

const validateBodySchema = z.object({
  csvContent: z.string({ required_error: 'Missing CSV content.' }).min(1, 'Missing CSV content.'),
  fileName: z.string().trim().min(1).optional(),
  template: z.unknown().optional(),
});

const templateBodySchema = z.object({
  template: z.unknown().refine((t) => t !== undefined && t !== null, 'Missing template.'),
});

const parseBody = <S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValidatorError({
      code: 'INVALID_REQUEST',
      message: first ? first.message : 'Invalid request.',
    });
  }
  return parsed.data;
};

const sendError = (res: Response, err: unknown, operation: string) => {
  const { status, body } = mapErrorToApiResponse(err, { operation });
  res.status(status).json(body);
};

/**
 * GET /api/validation/template
 */
export function handleGetTemplate(_req: Request, res: Response) {
  try {
    const { template, source } = getActiveTemplate();
    res.json({ success: true, data: { template, source } });
  } catch (err) {
    sendError(res, err, 'template.get');
  }
}

/**
 * PUT /api/validation/template
 * Replaces the active template wholesale. An invalid template leaves the
 * current one in place.
 */
export function handlePutTemplate(req: Request, res: Response) {
  try {
    const body = parseBody(templateBodySchema, req.body);
    const { template, source } = setActiveTemplate(loadTemplate(body.template));
    res.json({ success: true, data: { template, source } });
  } catch (err) {
    sendError(res, err, 'template.put');
  }
}

/**
 * DELETE /api/validation/template
 * Reverts to the embedded template.
 */
export function handleDeleteTemplate(_req: Request, res: Response) {
  try {
    const { template, source } = resetActiveTemplate();
    res.json({ success: true, data: { template, source } });
  } catch (err) {
    sendError(res, err, 'template.delete');
  }
}

/**
 * POST /api/validation/validate
 * Validates a whole CSV file. A template in the body applies to this request
 * only.
 */
export function handleValidate(req: Request, res: Response) {
  try {
    const body = parseBody(validateBodySchema, req.body);
    const template =
      body.template === undefined || body.template === null
        ? getActiveTemplate().template
        : loadTemplate(body.template);

    const run = validateSubmission({
      content: body.csvContent,
      fileName: body.fileName ?? DEFAULT_FILE_NAME,
      template,
    });

    res.json({
      success: true,
      data: {
        fileName: run.fileName,
        report: run.report,
        text: run.text,
      },
    });
  } catch (err) {
    sendError(res, err, 'validation.validate');
  }
}

/**
 * GET /api/validation/telemetry
 */
export function handleGetTelemetry(_req: Request, res: Response) {
  res.json({ success: true, data: telemetryStore.snapshot() });
}
