import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt, { type Algorithm, type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { Clock, Principal } from '../types';
import { AuthError, ForbiddenError } from './errors';

export type VerifierOptions = {
  secret: string;
  algorithms?: Algorithm[];
  clockToleranceSeconds?: number;
  issuer?: string;
  audience?: string;
  now?: Clock;
};

const claimsSchema = z.object({
  sub: z.union([z.string().min(1), z.number()]).transform(String),
  exp: z.number(),
  iat: z.number().optional(),
  nbf: z.number().optional(),
  scope: z.string().optional(),
  scopes: z.array(z.string()).optional(),
});

type Claims = z.infer<typeof claimsSchema>;

function scopesOf(claims: Claims): string[] {
  const fromString = claims.scope?.split(/\s+/).filter(Boolean) ?? [];
  return [...new Set([...fromString, ...(claims.scopes ?? [])])].sort();
}

/**
 * Stateless bearer-token verification: a pure function of the token, the
 * configured secret and the current time. Nothing is looked up in a store.
 */
export class TokenVerifier {
  private readonly secret: string;
  private readonly algorithms: Algorithm[];
  private readonly tolerance: number;
  private readonly issuer?: string;
  private readonly audience?: string;
  private readonly now: Clock;

  constructor(options: VerifierOptions) {
    if (!options.secret) throw new TypeError('TokenVerifier requires a secret');
    this.secret = options.secret;
    this.algorithms = options.algorithms ?? ['HS256'];
    this.tolerance = options.clockToleranceSeconds ?? 0;
    this.issuer = options.issuer;
    this.audience = options.audience;
    this.now = options.now ?? Date.now;
  }

  verify(token: string | undefined): Principal {
    if (!token) throw new AuthError('Missing', 'no bearer token presented');

    let decoded: JwtPayload | null;
    try {
      decoded = jwt.decode(token, { json: true });
    } catch (error) {
      // A payload segment that is not JSON makes decode throw.
      throw new AuthError('Malformed', 'token could not be decoded', { cause: error });
    }
    if (!decoded) throw new AuthError('Malformed', 'token could not be decoded');
    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) throw new AuthError('Malformed', 'token claims are incomplete', { cause: parsed.error });
    const claims = parsed.data;

    // Expiry first, so an expired token reads as expired whatever its signature.
    const nowSeconds = Math.floor(this.now() / 1000);
    if (nowSeconds >= claims.exp + this.tolerance) {
      throw new AuthError('Expired', 'token has expired');
    }

    try {
      jwt.verify(token, this.secret, {
        algorithms: this.algorithms,
        clockTimestamp: nowSeconds,
        clockTolerance: this.tolerance,
        issuer: this.issuer,
        audience: this.audience,
      });
    } catch (error) {
      throw toAuthError(error);
    }

    return Object.freeze({
      subject: claims.sub,
      issuedAt: new Date((claims.iat ?? nowSeconds) * 1000),
      expiresAt: new Date(claims.exp * 1000),
      scopes: Object.freeze(scopesOf(claims)),
    });
  }

  isActive(principal: Principal): boolean {
    return this.now() < principal.expiresAt.getTime() + this.tolerance * 1000;
  }
}

function toAuthError(error: unknown): AuthError {
  if (error instanceof jwt.TokenExpiredError) return new AuthError('Expired', 'token has expired', { cause: error });
  if (error instanceof jwt.NotBeforeError) return new AuthError('NotYetValid', 'token is not valid yet', { cause: error });
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'jwt malformed' || error.message === 'invalid token') {
      return new AuthError('Malformed', 'token could not be decoded', { cause: error });
    }
    return new AuthError('InvalidSignature', 'token failed verification', { cause: error });
  }
  return new AuthError('InvalidSignature', 'token failed verification', { cause: error });
}

export function bearerToken(req: Request): string | undefined {
  const header = req.header('authorization');
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  // A present but unusable header is malformed rather than missing.
  if (!match) throw new AuthError('Malformed', 'authorization header is not a bearer token');
  return match[1];
}

export function sendAuthError(res: Response, error: AuthError | ForbiddenError): void {
  if (error instanceof AuthError) {
    res.setHeader('WWW-Authenticate', `Bearer error="invalid_token", error_description="${error.kind}"`);
  }
  res.status(error.status).json({ error: error.category, kind: error.kind });
}

export type AuthenticateOptions = {
  verifier: TokenVerifier;
  /** Let requests without an Authorization header through anonymously. */
  optional?: boolean;
  hooks?: {
    onRejected?: (info: { error: AuthError; req: Request }) => void;
  };
};

export function authenticate(options: AuthenticateOptions): RequestHandler {
  const { verifier, optional = false, hooks } = options;

  return function authenticateMiddleware(req: Request, res: Response, next: NextFunction) {
    try {
      const token = bearerToken(req);
      if (!token && optional) return next();
      req.principal = verifier.verify(token);
      next();
    } catch (error) {
      if (error instanceof AuthError) {
        hooks?.onRejected?.({ error, req });
        sendAuthError(res, error);
        return;
      }
      next(error);
    }
  };
}

/**
 * Requires an authenticated, still-unexpired principal holding every scope in
 * `scopes`. Expiry is checked again here because a principal must never be
 * trusted past its expiry, even mid-request.
 */
export function requireScopes(verifier: TokenVerifier, ...scopes: string[]): RequestHandler {
  return function requireScopesMiddleware(req: Request, res: Response, next: NextFunction) {
    const principal = req.principal;
    if (!principal) return sendAuthError(res, new AuthError('Missing', 'route requires authentication'));
    if (!verifier.isActive(principal)) return sendAuthError(res, new AuthError('Expired', 'token has expired'));
    const missing = scopes.filter((scope) => !principal.scopes.includes(scope));
    if (missing.length > 0) return sendAuthError(res, new ForbiddenError(missing));
    next();
  };
}
