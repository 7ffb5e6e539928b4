import type { UserRecord } from '@src/models/User';

declare global {
  namespace Express {
    interface Request {
      /** Set by the `authenticate` middleware. */
      currentUser?: UserRecord;
    }
  }
}

export {};
