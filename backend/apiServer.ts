import 'dotenv/config';
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';

import { loadValidatorConfig, type ValidatorConfig } from './config/validatorConfig';
import { createValidationRouter } from './modules/validation/validation.routes';
import { mapErrorToApiResponse } from './reliability/FailureHandling';

const hasType = (err: unknown, type: string) =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === type;

/** Body parser failures get their own answers; the rest go through the error mapper. */
export function createApiErrorHandler(config: Pick<ValidatorConfig['api'], 'bodyLimit'>) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (hasType(err, 'entity.too.large')) {
      res.status(413).json({
        success: false,
        errorMessage: `Request body is larger than the ${config.bodyLimit} limit.`,
      });
      return;
    }
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({ success: false, errorMessage: 'Request body is not valid JSON.' });
      return;
    }
    const { status, body } = mapErrorToApiResponse(err, { operation: 'api.unhandled' });
    res.status(status).json(body);
  };
}

export function createApiApp(config: ValidatorConfig['api']): Express {
  const app = express();
  app.use(express.json({ limit: config.bodyLimit }));

  app.use((req, res, next) => {
    const timer = setTimeout(() => {
      if (res.headersSent) return;
      res.status(504).json({ success: false, errorMessage: 'Gateway Timeout' });
    }, config.timeoutMs);

    res.on('finish', () => clearTimeout(timer));
    res.on('close', () => clearTimeout(timer));
    req.setTimeout(config.timeoutMs);
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/api', createValidationRouter());

  // Fallback 404 for any unhandled /api route.
  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, errorMessage: 'Not Found' });
  });

  app.use(createApiErrorHandler(config));

  return app;
}

if (require.main === module) {
  const { api } = loadValidatorConfig();
  createApiApp(api).listen(api.port, () => {
    // eslint-disable-next-line no-console
    console.log(`[api] listening on http://localhost:${api.port}`);
  });
}
