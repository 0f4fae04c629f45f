import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { JwtConfig } from '../../connections/config/app.config';

const CONFIRMATION_TOKEN_LIFETIME_SECONDS = 7 * 24 * 60 * 60;

export const TokenScope = {
  session: 'access_token',
  confirmation: 'email_confirmation',
} as const;

export type TokenScope = (typeof TokenScope)[keyof typeof TokenScope];

const claimsSchema = z.object({
  sub: z.string().min(1),
  scope: z.enum([TokenScope.session, TokenScope.confirmation]),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

/**
 * Raised for any token that fails verification. Callers decide which
 * HTTP error it becomes; the reason stays in `reason` for logs.
 */
export class InvalidTokenError extends Error {
  constructor(readonly reason: string) {
    super('The token is invalid or expired');
    this.name = 'InvalidTokenError';
  }
}

/**
 * Issues and verifies the two kinds of JWT the API hands out.
 * Session tokens carry the username as subject; confirmation tokens
 * carry the email. Both share one secret and algorithm, and the `scope`
 * claim decides which verifier accepts them.
 */
export class TokenService {
  constructor(private readonly config: JwtConfig) {}

  issueSessionToken(username: string, ttlSeconds?: number): string {
    return this.sign(username, TokenScope.session, ttlSeconds ?? this.config.expiresInSeconds);
  }

  issueConfirmationToken(email: string): string {
    return this.sign(email, TokenScope.confirmation, CONFIRMATION_TOKEN_LIFETIME_SECONDS);
  }

  verifySessionToken(token: string): TokenClaims {
    return this.verify(token, TokenScope.session);
  }

  verifyConfirmationToken(token: string): TokenClaims {
    return this.verify(token, TokenScope.confirmation);
  }

  private sign(subject: string, scope: TokenScope, expiresIn: number): string {
    return jwt.sign({ scope }, this.config.secret, {
      algorithm: this.config.algorithm,
      subject,
      expiresIn,
    });
  }

  private verify(token: string, scope: TokenScope): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, { algorithms: [this.config.algorithm] });
    } catch (error: unknown) {
      throw new InvalidTokenError(error instanceof Error ? error.message : String(error));
    }

    if (typeof decoded === 'string') {
      throw new InvalidTokenError('payload is not a claims object');
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidTokenError('malformed claims');
    }

    if (parsed.data.scope !== scope) {
      throw new InvalidTokenError(`expected scope ${scope}, got ${parsed.data.scope}`);
    }

    return parsed.data;
  }
}
