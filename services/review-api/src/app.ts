/**
 * Review API
 *
 * HTTP surface for the people who act on a project's verdict: read the
 * divergences and document statuses of the last run, resolve divergences
 * and acknowledge documents flagged for manual review.
 */

import express, { Request, Response, NextFunction } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  isLedgerError,
  buildVerdict,
  config,
  InvalidRequestError,
  parseDivergenceKey,
  RECONCILED_FIELDS,
  type DocumentState,
  type ErrorCode,
  type ErrorEnvelope,
  type ReconciledField,
  type ResolutionPolicy,
} from '@ledgerline/shared';
import { ProjectService } from './lib/project-service';

const POLICIES: readonly ResolutionPolicy[] = ['keep-spreadsheet', 'accept-extracted', 'accept-document'];

const DOCUMENT_STATES: readonly DocumentState[] = [
  'queued',
  'extracted',
  'pending-ocr',
  'ocr-exhausted',
  'needs-manual-review',
  'classification-failed',
  'filtered-out',
  'reviewed',
];

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  configuration_invalid: 500,
  state_corrupt: 500,
  spreadsheet_write_conflict: 409,
  scope_violation: 403,
  not_found: 404,
  invalid_request: 400,
};

export interface AppOptions {
  projectDir: string;
  now?: () => string;
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: string, message: string): void {
  const envelope: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(envelope);
}

function handleError(res: Response, error: unknown, message: string): void {
  if (isLedgerError(error)) {
    sendError(res, STATUS_BY_CODE[error.code], error.code, error.message);
    return;
  }
  logger.error(message, error);
  sendError(res, 500, 'internal_error', message);
}

function isPolicy(value: unknown): value is ResolutionPolicy {
  return POLICIES.some((p) => p === value);
}

function isDocumentState(value: unknown): value is DocumentState {
  return DOCUMENT_STATES.some((s) => s === value);
}

function isReconciledField(value: unknown): value is ReconciledField {
  return RECONCILED_FIELDS.some((f) => f === value);
}

function optionalInteger(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed)) {
    throw new InvalidRequestError(`${name} must be an integer`);
  }
  return parsed;
}

function optionalString(value: unknown, name: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new InvalidRequestError(`${name} must be a non-empty string`);
  }
  return value;
}

export function createApp(options: AppOptions): express.Express {
  const service = new ProjectService(options.projectDir, { now: options.now });
  const app = express();

  // Middleware
  app.use(express.json());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('X-Correlation-Id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      const project = await service.project();
      res.json({
        status: 'healthy',
        service: 'review-api',
        project: project.project_name,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'review-api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: new Date().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * GET /status
   * Verdict over the last run's divergences and the current document statuses
   */
  app.get('/status', async (req: Request, res: Response) => {
    try {
      const snapshot = await service.divergenceSnapshot();
      const documents = await service.documents();
      res.json({
        batch_id: snapshot.batch_id,
        generated_at: snapshot.generated_at,
        verdict: buildVerdict({
          documents,
          divergences: snapshot.divergences,
          ocrMaxAttempts: config.ocrMaxAttempts,
        }),
      });
    } catch (error) {
      handleError(res, error, 'Failed to compute status');
    }
  });

  /**
   * GET /divergences
   * Divergences of the last run, filterable by classification, provider,
   * competence and field
   */
  app.get('/divergences', async (req: Request, res: Response) => {
    try {
      const provider = optionalInteger(req.query.provider, 'provider');
      const competence = optionalString(req.query.competence, 'competence');
      const classification = optionalString(req.query.classification, 'classification');
      const unresolved = req.query.unresolved === 'true';

      const snapshot = await service.divergenceSnapshot();
      const items = snapshot.divergences.filter(
        (d) =>
          (provider === undefined || d.provider === provider) &&
          (competence === undefined || d.competence === competence) &&
          (classification === undefined || d.classification === classification) &&
          (!unresolved || d.resolution === null)
      );

      res.json({ batch_id: snapshot.batch_id, items });
    } catch (error) {
      handleError(res, error, 'Failed to list divergences');
    }
  });

  /**
   * POST /divergences/:key/resolution
   * Body: { policy, entry_id? }
   */
  app.post('/divergences/:key/resolution', async (req: Request, res: Response) => {
    try {
      if (!parseDivergenceKey(req.params.key)) {
        throw new InvalidRequestError(`Malformed divergence key: ${req.params.key}`);
      }
      const body: unknown = req.body;
      const policy = typeof body === 'object' && body !== null && 'policy' in body ? body.policy : undefined;
      if (!isPolicy(policy)) {
        throw new InvalidRequestError(`policy must be one of ${POLICIES.join(', ')}`);
      }
      const entryId =
        typeof body === 'object' && body !== null && 'entry_id' in body
          ? optionalString(body.entry_id, 'entry_id')
          : undefined;

      const result = await service.resolve(req.params.key, { policy, entryId });
      res.json(result);
    } catch (error) {
      handleError(res, error, 'Failed to resolve divergence');
    }
  });

  /**
   * POST /divergences/resolve-all
   * Body: { policy, provider?, competence?, field? }
   */
  app.post('/divergences/resolve-all', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null) {
        throw new InvalidRequestError('Request body must be a JSON object');
      }
      const policy = 'policy' in body ? body.policy : undefined;
      if (policy !== 'keep-spreadsheet' && policy !== 'accept-extracted') {
        throw new InvalidRequestError('policy must be keep-spreadsheet or accept-extracted');
      }
      const field = 'field' in body ? body.field : undefined;
      if (field !== undefined && !isReconciledField(field)) {
        throw new InvalidRequestError(`field must be one of ${RECONCILED_FIELDS.join(', ')}`);
      }

      const resolutions = await service.resolveAll(policy, {
        provider: optionalInteger('provider' in body ? body.provider : undefined, 'provider'),
        competence: optionalString('competence' in body ? body.competence : undefined, 'competence'),
        field,
      });
      res.json({ resolved: resolutions.length, items: resolutions });
    } catch (error) {
      handleError(res, error, 'Failed to resolve divergences');
    }
  });

  /**
   * GET /documents?status=
   */
  app.get('/documents', async (req: Request, res: Response) => {
    try {
      const status = req.query.status;
      if (status !== undefined && !isDocumentState(status)) {
        throw new InvalidRequestError(`status must be one of ${DOCUMENT_STATES.join(', ')}`);
      }
      res.json({ items: await service.documents(status) });
    } catch (error) {
      handleError(res, error, 'Failed to list documents');
    }
  });

  /**
   * POST /documents/review
   * Body: { path }
   */
  app.post('/documents/review', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const documentPath =
        typeof body === 'object' && body !== null && 'path' in body ? optionalString(body.path, 'path') : undefined;
      if (documentPath === undefined) {
        throw new InvalidRequestError('path is required');
      }
      res.json(await service.markReviewed(documentPath));
    } catch (error) {
      handleError(res, error, 'Failed to mark document reviewed');
    }
  });

  // Unknown routes
  app.use((req: Request, res: Response) => {
    sendError(res, 404, 'not_found', `No route for ${req.method} ${req.path}`);
  });

  return app;
}
