import { describe, it, expect, afterEach, vi } from 'vitest';
import { JoseTokenService, type TokenServiceConfig } from '../auth/token-service';

function createService(overrides: Partial<TokenServiceConfig> = {}) {
  return new JoseTokenService({
    activeKid: overrides.activeKid ?? 'key-1',
    keys: overrides.keys ?? [
      { kid: 'key-1', secret: 'a'.repeat(32) },
      { kid: 'key-2', secret: 'b'.repeat(32) },
    ],
    accessTokenTtlMinutes: overrides.accessTokenTtlMinutes ?? 30,
    issuer: overrides.issuer,
    audience: overrides.audience,
  });
}

describe('JoseTokenService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('signs and verifies an access token', async () => {
    const service = createService();
    const token = await service.signAccessToken({ userId: 'user-123', role: 'EVOwner' });
    expect(token.split('.')).toHaveLength(3);

    expect(await service.verifyAccessToken(token)).toEqual({ userId: 'user-123', role: 'EVOwner' });
  });

  it('verifies token signed with old key after rotation', async () => {
    const serviceOld = createService({ activeKid: 'key-1' });
    const token = await serviceOld.signAccessToken({ userId: 'user-456', role: 'Admin' });

    const serviceNew = createService({ activeKid: 'key-2' });
    expect(await serviceNew.verifyAccessToken(token)).toEqual({ userId: 'user-456', role: 'Admin' });
  });

  it('rejects token signed with unknown key', async () => {
    const foreign = new JoseTokenService({
      activeKid: 'unknown-key',
      keys: [{ kid: 'unknown-key', secret: 'x'.repeat(32) }],
      accessTokenTtlMinutes: 30,
    });
    const token = await foreign.signAccessToken({ userId: 'user-789', role: 'Admin' });

    await expect(createService().verifyAccessToken(token)).rejects.toThrow();
    expect(await createService().identifyAccessToken(token)).toBeNull();
  });

  it('rejects a token for another audience', async () => {
    const token = await createService({ audience: 'other-app' }).signAccessToken({
      userId: 'user-1',
      role: 'EVOwner',
    });

    await expect(createService().verifyAccessToken(token)).rejects.toThrow();
  });

  it('throws if active kid is not found in keys', () => {
    expect(() =>
      new JoseTokenService({
        activeKid: 'nonexistent',
        keys: [{ kid: 'key-1', secret: 'a'.repeat(32) }],
        accessTokenTtlMinutes: 30,
      }),
    ).toThrow("Active JWT key 'nonexistent' not found in keys");
  });

  describe('expired tokens', () => {
    it('fails verification but still identifies the holder', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'));
      const service = createService({ accessTokenTtlMinutes: 1 });
      const token = await service.signAccessToken({ userId: 'user-5', role: 'StationUser' });

      vi.setSystemTime(new Date('2026-03-01T00:05:00.000Z'));

      await expect(service.verifyAccessToken(token)).rejects.toThrow();
      expect(await service.identifyAccessToken(token)).toEqual({
        userId: 'user-5',
        role: 'StationUser',
      });
    });
  });

  it('does not identify a tampered token', async () => {
    const service = createService();
    const token = await service.signAccessToken({ userId: 'user-1', role: 'EVOwner' });
    const [header, , signature] = token.split('.');
    const forgedPayload = Buffer.from(JSON.stringify({ sub: 'user-1', role: 'Admin' })).toString(
      'base64url',
    );

    expect(await service.identifyAccessToken(`${header}.${forgedPayload}.${signature}`)).toBeNull();
  });

  it('does not identify garbage', async () => {
    expect(await createService().identifyAccessToken('not-a-jwt')).toBeNull();
  });

  it('generates distinct token ids, secrets and salts', () => {
    const service = createService();
    expect(service.generateTokenId()).not.toBe(service.generateTokenId());
    expect(service.generateRefreshSecret()).not.toBe(service.generateRefreshSecret());
    expect(service.generateRefreshSecret().length).toBeGreaterThan(20);
    expect(service.generateSalt()).not.toBe(service.generateSalt());
  });

  it('hashes a secret with its salt deterministically', () => {
    const service = createService();
    const h1 = service.hashRefreshSecret('secret', 'salt-a');
    expect(h1).toBe(service.hashRefreshSecret('secret', 'salt-a'));
    expect(h1).toHaveLength(64);
    expect(h1).not.toBe(service.hashRefreshSecret('secret', 'salt-b'));
  });

  it('verifies a secret against its stored hash', () => {
    const service = createService();
    const hash = service.hashRefreshSecret('secret', 'salt-a');

    expect(service.verifyRefreshSecret('secret', 'salt-a', hash)).toBe(true);
    expect(service.verifyRefreshSecret('other', 'salt-a', hash)).toBe(false);
    expect(service.verifyRefreshSecret('secret', 'salt-a', 'abc')).toBe(false);
  });
});
