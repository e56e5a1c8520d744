import { SignJWT, jwtVerify, compactVerify, decodeProtectedHeader, type JWTPayload } from 'jose';
import { randomBytes, randomUUID, createHash, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { ROLES, type AccessTokenClaims, type TokenService } from '@voltgate/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

export interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtlMinutes: number;
  issuer?: string;
  audience?: string;
}

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
});

export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtlMinutes: number;
  private readonly issuer: string;
  private readonly audience: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtlMinutes = config.accessTokenTtlMinutes;
    this.issuer = config.issuer ?? 'voltgate';
    this.audience = config.audience ?? 'voltgate-clients';
  }

  async signAccessToken(claims: AccessTokenClaims): Promise<string> {
    return new SignJWT({ role: claims.role })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setSubject(claims.userId)
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setAudience(this.audience)
      .setExpirationTime(`${this.accessTokenTtlMinutes}m`)
      .sign(this.activeKey.secret);
  }

  async verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    const { payload } = await jwtVerify(token, (header) => this.resolveKey(header.kid), {
      issuer: this.issuer,
      audience: this.audience,
      algorithms: ['HS256'],
    });
    return toClaims(payload);
  }

  /**
   * Signature-only check used to key rate limits by user. Expired tokens
   * still identify their holder; anything unsigned or malformed does not.
   */
  async identifyAccessToken(token: string): Promise<AccessTokenClaims | null> {
    try {
      const { kid, alg } = decodeProtectedHeader(token);
      if (alg !== 'HS256') return null;
      const { payload } = await compactVerify(token, this.resolveKey(kid), {
        algorithms: ['HS256'],
      });
      const parsed: unknown = JSON.parse(new TextDecoder().decode(payload));
      const claims = ClaimsSchema.safeParse(parsed);
      return claims.success ? { userId: claims.data.sub, role: claims.data.role } : null;
    } catch {
      return null;
    }
  }

  generateTokenId(): string {
    return randomUUID();
  }

  generateRefreshSecret(): string {
    return randomBytes(32).toString('base64url');
  }

  generateSalt(): string {
    return randomBytes(16).toString('base64url');
  }

  hashRefreshSecret(secret: string, salt: string): string {
    return createHash('sha256').update(`${salt}:${secret}`).digest('hex');
  }

  verifyRefreshSecret(secret: string, salt: string, expectedHash: string): boolean {
    const actual = Buffer.from(this.hashRefreshSecret(secret, salt), 'hex');
    const expected = Buffer.from(expectedHash, 'hex');
    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }

  private resolveKey(kid: string | undefined): Uint8Array {
    const key = kid ? this.keys.get(kid) : undefined;
    if (!key) {
      throw new Error('No JWT key matches the token kid');
    }
    return key.secret;
  }
}

function toClaims(payload: JWTPayload): AccessTokenClaims {
  const claims = ClaimsSchema.safeParse(payload);
  if (!claims.success) {
    throw new Error('JWT is missing sub or role claims');
  }
  return { userId: claims.data.sub, role: claims.data.role };
}
