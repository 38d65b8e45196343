import '../types/express';
import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Actor, USER_ROLES, UserRole } from '../models/User';
import { AuthenticationError, AuthorizationError, mapJWTError } from '../utils/errors';

/**
 * Resolves the acting user from a bearer token
 */
export interface IdentityProvider {
  resolve(token: string): Promise<Actor>;
}

const tokenPayloadSchema = z.object({
  sub: z.string().min(1).max(64),
  role: z.enum(USER_ROLES)
});

export interface JwtIdentityProviderOptions {
  secret: string;
  issuer?: string;
  audience?: string;
}

export class JwtIdentityProvider implements IdentityProvider {
  constructor(private readonly options: JwtIdentityProviderOptions) {
    if (!options.secret) {
      throw new Error('JWT secret is required');
    }
  }

  async resolve(token: string): Promise<Actor> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, this.claimOptions());
    } catch (error) {
      throw mapJWTError(error);
    }

    const payload = tokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new AuthenticationError('Authentication token is missing the subject or role');
    }

    return { id: payload.data.sub, role: payload.data.role };
  }

  /**
   * Issues a token for the given actor. Used by seeding scripts and tests.
   */
  sign(actor: Actor, expiresIn: number = 3600): string {
    return jwt.sign({ role: actor.role }, this.options.secret, {
      subject: actor.id,
      expiresIn,
      ...this.claimOptions()
    });
  }

  // jsonwebtoken rejects claim keys that are present but undefined
  private claimOptions(): { issuer?: string; audience?: string } {
    return {
      ...(this.options.issuer ? { issuer: this.options.issuer } : {}),
      ...(this.options.audience ? { audience: this.options.audience } : {})
    };
  }
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header) {
    return undefined;
  }
  const [scheme, token] = header.split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
}

export const authenticate = (identityProvider: IdentityProvider) =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const token = bearerToken(req);
    if (!token) {
      next(new AuthenticationError('Authentication token is required'));
      return;
    }

    identityProvider.resolve(token)
      .then((actor) => {
        req.actor = actor;
        next();
      })
      .catch(next);
  };

export const requireRole = (...roles: UserRole[]) =>
  (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.actor) {
      next(new AuthenticationError('Authentication token is required'));
      return;
    }
    if (!roles.includes(req.actor.role)) {
      next(new AuthorizationError());
      return;
    }
    next();
  };

/**
 * The authenticated actor of a request that has passed `authenticate`
 */
export function requireActor(req: Request): Actor {
  if (!req.actor) {
    throw new AuthenticationError('Authentication token is required');
  }
  return req.actor;
}
