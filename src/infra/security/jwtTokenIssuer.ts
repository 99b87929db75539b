import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { User } from '../../domain/auth/user.js';
import type {
  AccessTokenClaims,
  IssuedAccessToken,
  TokenIssuer,
} from '../../application/auth/ports.js';
import type { JwtConfig } from '../config/config.js';

/**
 * HS256 access tokens carrying the user id as `sub`.
 */
export class JwtTokenIssuer implements TokenIssuer {
  constructor(private readonly config: JwtConfig) {}

  generateToken(user: User): IssuedAccessToken {
    const accessToken = jwt.sign(
      {
        email: user.email,
        given_name: user.firstName,
        family_name: user.lastName,
      },
      this.config.secret,
      {
        algorithm: 'HS256',
        subject: user.id,
        issuer: this.config.issuer,
        expiresIn: this.config.accessTokenTtlSeconds,
      }
    );

    return { accessToken, expiresIn: this.config.accessTokenTtlSeconds };
  }

  verifyAccessToken(accessToken: string): AccessTokenClaims | null {
    const payload = this.decode(accessToken, false);
    if (!payload || typeof payload.email !== 'string') {
      return null;
    }
    return { userId: payload.sub, email: payload.email };
  }

  readSubject(accessToken: string): string | null {
    return this.decode(accessToken, true)?.sub ?? null;
  }

  private decode(
    accessToken: string,
    ignoreExpiration: boolean
  ): (JwtPayload & { sub: string }) | null {
    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(accessToken, this.config.secret, {
        algorithms: ['HS256'],
        issuer: this.config.issuer,
        ignoreExpiration,
      });
    } catch (error) {
      // Bad signature, malformed or expired token
      if (error instanceof jwt.JsonWebTokenError) {
        return null;
      }
      throw error;
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string') {
      return null;
    }
    return { ...payload, sub: payload.sub };
  }
}
