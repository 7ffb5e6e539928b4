import morgan from 'morgan';
import helmet from 'helmet';
import compression from 'compression';
import cors from 'cors';
import express, { Express, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import multer from 'multer';
import logger from 'jet-logger';

import apiRouter from '@src/routes';

import Paths from '@src/common/constants/Paths';
import type { AppConfig } from '@src/common/constants/ENV';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import { APP_VERSION, NodeEnvs } from '@src/common/constants';
import type { UserRepo } from '@src/repos/UserRepo';
import type { AuthService } from '@src/services/authService';
import type { ExtractionService } from '@src/services/extractionService';


/******************************************************************************
                                Types
******************************************************************************/

export interface AppDeps {
  config: AppConfig;
  auth: AuthService;
  users: UserRepo;
  extractions: ExtractionService;
}


/******************************************************************************
                                Setup
******************************************************************************/

export function createApp({ config, auth, users, extractions }: AppDeps): Express {
  const app = express();

  /** ******** Middleware ******** **/

  app.use(express.urlencoded({ extended: true }));
  app.use(express.json({ limit: '5mb' }));

  app.use(compression());

  const allowAll = config.allowedOrigins.includes('*');
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || allowAll || config.allowedOrigins.includes(origin)) return cb(null, true);
        return cb(new RouteError(HttpStatusCodes.FORBIDDEN, 'Not allowed by CORS'));
      },
    }),
  );

  // Show routes called in console during development
  if (config.nodeEnv === NodeEnvs.Dev) {
    app.use(morgan('dev'));
  }

  if (config.nodeEnv === NodeEnvs.Production) {
    app.use(helmet());
  }

  // Rate limiting on the API; skipped under test so suites can hammer it
  const skipInTest = () => config.nodeEnv === NodeEnvs.Test;
  app.use(
    Paths.Base + '/',
    rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: config.rateLimit.apiMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: skipInTest,
      message: { detail: 'Too many requests from this IP, please try again later.' },
    }),
  );

  // Extraction calls the language model, so it gets a tighter budget
  const extractLimiter = rateLimit({
    windowMs: 60 * 60 * 1000,
    limit: config.rateLimit.extractMaxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    skip: skipInTest,
    message: { detail: 'Too many extraction requests, please try again later.' },
  });

  /** ******** Routes ******** **/

  app.get(Paths.Health, (_: Request, res: Response) => {
    res.json({ status: 'healthy', app_name: config.appName, version: APP_VERSION });
  });

  app.get('/', (_: Request, res: Response) => {
    res.json({
      message: `Welcome to ${config.appName}`,
      health: Paths.Health,
      endpoints: {
        extract: `POST ${Paths.Base}${Paths.Extract}`,
        get_extraction: `GET ${Paths.Base}${Paths.Extractions.Base}/{document_id}`,
        list_extractions: `GET ${Paths.Base}${Paths.Extractions.Base}`,
        delete_extraction: `DELETE ${Paths.Base}${Paths.Extractions.Base}/{document_id}`,
      },
    });
  });

  app.use(
    Paths.Base,
    apiRouter({
      auth,
      users,
      extractions,
      maxUploadBytes: config.maxUploadBytes,
      extractGuards: [extractLimiter],
    }),
  );

  app.use((_: Request, res: Response) => {
    res.status(HttpStatusCodes.NOT_FOUND).json({ detail: 'Not Found' });
  });

  /** ******** Error handler ******** **/

  // Express recognises error handlers by arity, so `next` stays in the signature
  app.use((err: Error, _: Request, res: Response, _next: NextFunction) => {
    let status = HttpStatusCodes.INTERNAL_SERVER_ERROR;
    let body: Record<string, unknown> = { detail: 'Internal server error' };

    if (err instanceof RouteError) {
      status = err.status;
      body = { detail: err.message, ...err.extra };
    } else if (err instanceof multer.MulterError) {
      status = err.code === 'LIMIT_FILE_SIZE'
        ? HttpStatusCodes.PAYLOAD_TOO_LARGE
        : HttpStatusCodes.BAD_REQUEST;
      body = { detail: err.message };
    } else if (err instanceof SyntaxError) {
      // malformed JSON body
      status = HttpStatusCodes.BAD_REQUEST;
      body = { detail: 'Malformed request body' };
    }

    if (status >= 500 && config.nodeEnv !== NodeEnvs.Test) {
      logger.err(err, true);
    }
    res.status(status).json(body);
  });

  return app;
}
