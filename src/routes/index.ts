import { Router, RequestHandler } from 'express';

import Paths from '@src/common/constants/Paths';
import { authenticate } from '@src/middleware/auth';
import type { UserRepo } from '@src/repos/UserRepo';
import type { AuthService } from '@src/services/authService';
import type { ExtractionService } from '@src/services/extractionService';

import authRouter from './auth';
import extractionRouter from './extraction.routes';


/******************************************************************************
                                Setup
******************************************************************************/

export interface ApiDeps {
  auth: AuthService;
  users: UserRepo;
  extractions: ExtractionService;
  maxUploadBytes: number;
  extractGuards?: RequestHandler[];
}

/**
 * Root API router, mounted at /api in server.ts.
 */
export default function apiRouter(deps: ApiDeps): Router {
  const router = Router();

  /** Access layer */
  router.use(Paths.Auth.Base, authRouter(deps.auth, deps.users)); // → /api/auth/...

  /** Extractions (all authenticated) */
  router.use(
    extractionRouter(deps.extractions, {
      guard: authenticate(deps.auth, deps.users),
      maxUploadBytes: deps.maxUploadBytes,
      extractGuards: deps.extractGuards,
    }),
  ); // → /api/extract, /api/extractions/...

  return router;
}
