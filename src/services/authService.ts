import bcrypt from 'bcryptjs';
import jwt, { JwtPayload, SignOptions } from 'jsonwebtoken';
import logger from 'jet-logger';

import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import type { UserRecord } from '@src/models/User';
import type { UserRepo } from '@src/repos/UserRepo';

const BCRYPT_ROUNDS = 10;

export interface TokenPayload {
  sub: string; // user id
  username: string;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
}

export interface AuthConfig {
  secret: string;
  expiresIn: string;
}

export class AuthService {
  public constructor(
    private readonly users: UserRepo,
    private readonly config: AuthConfig,
  ) {}

  public hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
  }

  public verifyPassword(password: string, hashed: string): Promise<boolean> {
    return bcrypt.compare(password, hashed);
  }

  public generateAccessToken(user: UserRecord): string {
    const payload: TokenPayload = { sub: user.id, username: user.username };
    return jwt.sign(payload, this.config.secret, {
      algorithm: 'HS256',
      expiresIn: this.config.expiresIn,
    } as SignOptions);
  }

  /** Throws when the token is malformed, expired or signed with another key. */
  public verifyAccessToken(token: string): TokenPayload {
    const decoded = jwt.verify(token, this.config.secret, { algorithms: ['HS256'] });
    if (!isTokenPayload(decoded)) {
      throw new Error('Invalid access token');
    }
    return { sub: decoded.sub, username: decoded.username };
  }

  public async register(input: RegisterInput): Promise<UserRecord> {
    if (await this.users.findByEmail(input.email)) {
      throw new RouteError(HttpStatusCodes.BAD_REQUEST, 'Email already registered');
    }
    if (await this.users.findByUsername(input.username)) {
      throw new RouteError(HttpStatusCodes.BAD_REQUEST, 'Username already taken');
    }
    const user = await this.users.create({
      email: input.email,
      username: input.username,
      hashed_password: await this.hashPassword(input.password),
    });
    logger.info(`New user registered: ${user.username}`);
    return user;
  }

  /** `identifier` may be the username or the email. */
  public async login(identifier: string, password: string): Promise<AccessToken> {
    const user = await this.users.findByLogin(identifier);
    if (!user || !(await this.verifyPassword(password, user.hashed_password))) {
      throw new RouteError(HttpStatusCodes.UNAUTHORIZED, 'Incorrect username or password');
    }
    if (!user.is_active) {
      throw new RouteError(HttpStatusCodes.FORBIDDEN, 'User account is inactive');
    }
    logger.info(`User logged in: ${user.username}`);
    return { access_token: this.generateAccessToken(user), token_type: 'bearer' };
  }
}

function isTokenPayload(value: string | JwtPayload): value is JwtPayload & TokenPayload {
  return typeof value === 'object'
    && typeof value.sub === 'string'
    && typeof value['username'] === 'string';
}
