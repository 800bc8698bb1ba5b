// ─── Validation Routes ────────────────────────────────────────────────────

import { Router } from 'express';
import {
  handleDeleteTemplate,
  handleGetTelemetry,
  handleGetTemplate,
  handlePutTemplate,
  handleValidate,
} from './validation.controller';

export const createValidationRouter = () => {
  const router = Router();

  // Active template
  router.get('/validation/template', handleGetTemplate);
  router.put('/validation/template', handlePutTemplate);
  router.delete('/validation/template', handleDeleteTemplate);

  // Whole-file validation
  router.post('/validation/validate', handleValidate);

  // Recent runs and aggregates
  router.get('/validation/telemetry', handleGetTelemetry);

  return router;
};
