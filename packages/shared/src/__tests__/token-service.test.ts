import { describe, it, expect } from 'vitest';
import { SignJWT, decodeJwt } from 'jose';
import { JoseTokenService } from '../auth/token-service';

const SECRET = 'test-secret';

function createService(overrides: Partial<{ secret: string; accessTokenTtl: number }> = {}) {
  return new JoseTokenService({
    secret: overrides.secret ?? SECRET,
    accessTokenTtl: overrides.accessTokenTtl,
  });
}

describe('JoseTokenService', () => {
  it('signs and verifies an access token', async () => {
    const service = createService();
    const token = await service.signAccessToken(42);
    expect(token.split('.')).toHaveLength(3);

    const result = await service.verifyAccessToken(token);
    expect(result.userId).toBe(42);
  });

  it('puts the user id in the subject claim without expiry by default', async () => {
    const token = await createService().signAccessToken(7);
    const claims = decodeJwt(token);

    expect(claims.sub).toBe('7');
    expect(claims.iss).toBe('soiree');
    expect(claims.exp).toBeUndefined();
  });

  it('sets an expiry when a TTL is configured', async () => {
    const token = await createService({ accessTokenTtl: 60 }).signAccessToken(7);
    const claims = decodeJwt(token);

    const lifetime = (claims.exp ?? 0) - (claims.iat ?? 0);
    expect(lifetime).toBeGreaterThanOrEqual(60);
    expect(lifetime).toBeLessThanOrEqual(61);
  });

  it('rejects a token signed with another secret', async () => {
    const token = await createService({ secret: 'other-secret' }).signAccessToken(1);
    await expect(createService().verifyAccessToken(token)).rejects.toThrow();
  });

  it('rejects malformed tokens', async () => {
    await expect(createService().verifyAccessToken('not-a-token')).rejects.toThrow();
  });

  it('rejects a token without a subject', async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: 'HS256' })
      .setIssuer('soiree')
      .sign(new TextEncoder().encode(SECRET));

    await expect(createService().verifyAccessToken(token)).rejects.toThrow('JWT missing sub claim');
  });

  it('rejects a subject that is not a user id', async () => {
    const token = await new SignJWT({})
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject('alice')
      .setIssuer('soiree')
      .sign(new TextEncoder().encode(SECRET));

    await expect(createService().verifyAccessToken(token)).rejects.toThrow('JWT sub claim is not a user id');
  });

  it('throws on an empty secret', () => {
    expect(() => createService({ secret: '' })).toThrow('JWT secret must not be empty');
  });
});
