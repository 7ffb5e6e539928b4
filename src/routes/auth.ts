import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import Paths from '@src/common/constants/Paths';
import { authenticate, currentUser } from '@src/middleware/auth';
import { toPublicUser } from '@src/models/User';
import type { UserRepo } from '@src/repos/UserRepo';
import type { AuthService } from '@src/services/authService';

const RegisterBody = z.object({
  email: z.string().trim().email(),
  username: z.string().trim().min(3).max(50),
  password: z.string().min(6).max(72),
});

const LoginBody = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export default function authRouter(auth: AuthService, users: UserRepo): Router {
  const router = Router();

  // ==================== Register ====================
  router.post(Paths.Auth.Register, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = RegisterBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(HttpStatusCodes.UNPROCESSABLE_ENTITY).json({
        detail: 'Invalid registration data',
        errors: parsed.error.flatten().fieldErrors,
      });
      return;
    }
    try {
      const user = await auth.register(parsed.data);
      res.status(HttpStatusCodes.CREATED).json(toPublicUser(user));
    } catch (err) {
      next(err);
    }
  });

  // ==================== Login ====================
  router.post(Paths.Auth.Login, async (req: Request, res: Response, next: NextFunction) => {
    const parsed = LoginBody.safeParse(req.body);
    if (!parsed.success) {
      res.status(HttpStatusCodes.UNPROCESSABLE_ENTITY).json({
        detail: 'Invalid login data',
        errors: parsed.error.flatten().fieldErrors,
      });
      return;
    }
    try {
      const token = await auth.login(parsed.data.username, parsed.data.password);
      res.json(token);
    } catch (err) {
      next(err);
    }
  });

  // ==================== Current User ====================
  router.get(Paths.Auth.Me, authenticate(auth, users), (req: Request, res: Response) => {
    res.json(toPublicUser(currentUser(req)));
  });

  return router;
}
