import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { z } from 'zod';
import logger from 'jet-logger';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import Paths from '@src/common/constants/Paths';
import type { Failure } from '@src/common/util/failures';
import { RouteError } from '@src/common/util/route-errors';
import type { ExtractionService } from '@src/services/extractionService';

const ListQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

function statusFor(failure: Failure): HttpStatusCodes {
  switch (failure.kind) {
    case 'InvalidInput':
      return HttpStatusCodes.BAD_REQUEST;
    case 'NotFound':
      return HttpStatusCodes.NOT_FOUND;
    default:
      return HttpStatusCodes.INTERNAL_SERVER_ERROR;
  }
}

// busboy hands multipart filenames over as latin1; clients send UTF-8
function decodeFilename(raw: string): string {
  const decoded = Buffer.from(raw, 'latin1').toString('utf8');
  return decoded.includes('\uFFFD') ? raw : decoded;
}

function toRouteError(failure: Failure): RouteError {
  return new RouteError(statusFor(failure), failure.message, { kind: failure.kind });
}

export interface ExtractionRouterOptions {
  /** Runs first on every route, e.g. `authenticate`. */
  guard: RequestHandler;
  maxUploadBytes: number;
  /** Per-route guards for the upload endpoint, e.g. a rate limiter. */
  extractGuards?: RequestHandler[];
}

/**
 * Upload and retrieval endpoints, each behind `options.guard`.
 */
export default function extractionRouter(
  service: ExtractionService,
  options: ExtractionRouterOptions,
): Router {
  const router = Router();
  const { guard } = options;

  // Keep uploads in memory; the extractor needs the raw bytes
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 },
  });

  /**
   * POST /api/extract
   * multipart/form-data with key "file"
   */
  router.post(
    Paths.Extract,
    guard,
    ...(options.extractGuards ?? []),
    upload.single('file'),
    async (req: Request, res: Response, next: NextFunction) => {
      if (!req.file) {
        next(new RouteError(HttpStatusCodes.BAD_REQUEST, 'No file uploaded'));
        return;
      }

      try {
        const result = await service.submit({
          filename: decodeFilename(req.file.originalname),
          content: req.file.buffer,
        });

        if (result.ok) {
          res.status(HttpStatusCodes.CREATED).json(result.value);
          return;
        }

        const failure = result.error;
        if (failure.kind === 'InvalidInput') {
          next(toRouteError(failure));
          return;
        }
        logger.err(`Extraction failed: ${failure.message}`);
        next(new RouteError(HttpStatusCodes.INTERNAL_SERVER_ERROR, `Extraction failed: ${failure.message}`, {
          kind: failure.kind,
          extraction_id: failure.extraction?.id ?? null,
        }));
      } catch (err) {
        next(err);
      }
    },
  );

  /**
   * GET /api/extractions?skip=&limit=
   */
  router.get(Paths.Extractions.Base, guard, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ListQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(HttpStatusCodes.UNPROCESSABLE_ENTITY).json({
        detail: 'Invalid pagination parameters',
        errors: parsed.error.flatten().fieldErrors,
      });
      return;
    }
    try {
      const result = await service.list(parsed.data.skip, parsed.data.limit);
      if (!result.ok) {
        next(toRouteError(result.error));
        return;
      }
      res.json(result.value);
    } catch (err) {
      next(err);
    }
  });

  router.get(Paths.Extractions.Base + Paths.Extractions.One, guard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await service.get(req.params.id);
      if (!result.ok) {
        next(toRouteError(result.error));
        return;
      }
      res.json(result.value);
    } catch (err) {
      next(err);
    }
  });

  router.delete(Paths.Extractions.Base + Paths.Extractions.One, guard, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await service.remove(req.params.id);
      if (!result.ok) {
        next(toRouteError(result.error));
        return;
      }
      res.status(HttpStatusCodes.NO_CONTENT).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
