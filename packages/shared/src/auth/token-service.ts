import { SignJWT, jwtVerify } from 'jose';
import { type TokenService } from '@soiree/domain';

interface TokenServiceConfig {
  secret: string;
  /** Lifetime in seconds. Omit for tokens without an exp claim. */
  accessTokenTtl?: number;
  issuer?: string;
}

const SUBJECT_PATTERN = /^[1-9][0-9]*$/;

export class JoseTokenService implements TokenService {
  private readonly secret: Uint8Array;
  private readonly accessTokenTtl: number | undefined;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    if (config.secret.length === 0) {
      throw new Error('JWT secret must not be empty');
    }
    this.secret = new TextEncoder().encode(config.secret);
    this.accessTokenTtl = config.accessTokenTtl;
    this.issuer = config.issuer ?? 'soiree';
  }

  async signAccessToken(userId: number): Promise<string> {
    const jwt = new SignJWT({})
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject(String(userId))
      .setIssuedAt()
      .setIssuer(this.issuer);

    if (this.accessTokenTtl !== undefined) {
      jwt.setExpirationTime(`${this.accessTokenTtl}s`);
    }

    return jwt.sign(this.secret);
  }

  async verifyAccessToken(token: string): Promise<{ userId: number }> {
    const { payload } = await jwtVerify(token, this.secret, {
      issuer: this.issuer,
      algorithms: ['HS256'],
    });

    const sub = payload.sub;
    if (!sub) {
      throw new Error('JWT missing sub claim');
    }
    if (!SUBJECT_PATTERN.test(sub)) {
      throw new Error('JWT sub claim is not a user id');
    }

    return { userId: Number(sub) };
  }
}
