/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - AUTHENTICATION MIDDLEWARE
 * ============================================================================
 *
 * Bearer tokens are issued elsewhere; this service only verifies them. The
 * token's `sub` claim is the user id and `role` its scheduling role.
 */

import { Request, Response, NextFunction } from 'express';
import jwt, { type JwtPayload, TokenExpiredError } from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config/config';
import logger from '../config/logger';
import type { Actor, UserRole } from '../types';
import { AuthenticationError, AuthorizationError } from '../utils/errors';

declare global {
  namespace Express {
    interface Request {
      user?: Actor;
      requestId?: string;
    }
  }
}

const log = logger.child('auth');

const claimsSchema = z.object({
  sub: z.string().uuid(),
  role: z.enum(['patient', 'provider', 'admin']),
});

export interface TokenOptions {
  secret: string;
  issuer: string;
  audience: string;
}

const defaultTokenOptions = (): TokenOptions => ({
  secret: config.jwt.secret,
  issuer: config.jwt.issuer,
  audience: config.jwt.audience,
});

/**
 * Extract token from Authorization header
 */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  return scheme === 'Bearer' && token ? token : null;
}

/**
 * Verify an access token and return its caller
 */
export function verifyAccessToken(token: string, options: TokenOptions = defaultTokenOptions()): Actor {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, options.secret, {
      issuer: options.issuer,
      audience: options.audience,
      algorithms: ['HS256'],
    });
  } catch (error) {
    if (error instanceof TokenExpiredError) {
      throw new AuthenticationError('Token has expired');
    }
    throw new AuthenticationError('Invalid token');
  }

  const claims = claimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw new AuthenticationError('Token is missing required claims');
  }
  return { id: claims.data.sub, role: claims.data.role };
}

/**
 * Sign an access token; used by tooling and tests
 */
export function signAccessToken(actor: Actor, options: TokenOptions = defaultTokenOptions(), expiresIn = 3600): string {
  return jwt.sign({ role: actor.role }, options.secret, {
    subject: actor.id,
    issuer: options.issuer,
    audience: options.audience,
    algorithm: 'HS256',
    expiresIn,
  });
}

/**
 * Authentication middleware
 */
export function authenticate(options?: TokenOptions) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const token = extractToken(req.headers.authorization);

    if (!token) {
      log.warn('Authentication failed - No token provided', { ipAddress: req.ip, requestId: req.requestId });
      next(new AuthenticationError('Access token required'));
      return;
    }

    try {
      req.user = verifyAccessToken(token, options);
      next();
    } catch (error) {
      log.warn('Authentication failed - Invalid token', { ipAddress: req.ip, requestId: req.requestId });
      next(error);
    }
  };
}

/**
 * Role-based authorization middleware
 */
export function authorize(...allowedRoles: UserRole[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new AuthenticationError());
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      log.warn('Authorization failed - Insufficient role', {
        userId: req.user.id,
        userRole: req.user.role,
        requiredRoles: allowedRoles,
      });
      next(new AuthorizationError());
      return;
    }

    next();
  };
}

/**
 * The authenticated caller of a request
 */
export function currentActor(req: Request): Actor {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
}
