import { describe, it, expect, beforeEach, vi } from 'vitest';
import { hasAnyRole, bypassesOwnership, checkOwnership } from '../permissions';
import { describeDevice } from '../auth';
import { InMemoryEvOwnerRepository, makeEvOwner } from './in-memory-stores';

describe('hasAnyRole', () => {
  it('matches a role in the set', () => {
    expect(hasAnyRole('Admin', ['Admin', 'StationUser'])).toBe(true);
    expect(hasAnyRole('EVOwner', ['Admin', 'StationUser'])).toBe(false);
  });

  it('treats an empty set as any authenticated role', () => {
    expect(hasAnyRole('EVOwner', [])).toBe(true);
  });
});

describe('bypassesOwnership', () => {
  it('lets back-office roles through', () => {
    expect(bypassesOwnership('Admin')).toBe(true);
    expect(bypassesOwnership('StationUser')).toBe(true);
    expect(bypassesOwnership('EVOwner')).toBe(false);
  });
});

describe('checkOwnership', () => {
  let repo: InMemoryEvOwnerRepository;
  const owner = { userId: 'user-1', role: 'EVOwner' as const };
  const otherOwner = { userId: 'user-2', role: 'EVOwner' as const };

  beforeEach(() => {
    repo = new InMemoryEvOwnerRepository();
    repo.profiles.set('199012345678', makeEvOwner());
    repo.profiles.set('200098765432', makeEvOwner({ nic: '200098765432', userId: 'user-2' }));
  });

  describe('by user id', () => {
    const rule = { kind: 'userId', param: 'userId' } as const;

    it('allows an owner on their own id', async () => {
      expect(await checkOwnership(repo, owner, rule, 'user-1')).toBe('allowed');
    });

    it('forbids an owner on another id', async () => {
      expect(await checkOwnership(repo, owner, rule, 'user-2')).toBe('forbidden');
    });

    it('forbids an owner when the id is missing', async () => {
      expect(await checkOwnership(repo, owner, rule, undefined)).toBe('forbidden');
    });

    it('always allows an admin', async () => {
      expect(
        await checkOwnership(repo, { userId: 'admin-1', role: 'Admin' }, rule, 'user-2'),
      ).toBe('allowed');
    });
  });

  describe('by owner key', () => {
    const rule = { kind: 'nic', param: 'nic' } as const;

    it('allows an owner on their own profile', async () => {
      expect(await checkOwnership(repo, owner, rule, '199012345678')).toBe('allowed');
    });

    it("forbids an owner on another owner's profile", async () => {
      expect(await checkOwnership(repo, owner, rule, '200098765432')).toBe('forbidden');
    });

    it('forbids an unknown key', async () => {
      expect(await checkOwnership(repo, owner, rule, '000000000000')).toBe('forbidden');
    });

    it('allows a missing key when the caller has a linked profile', async () => {
      expect(await checkOwnership(repo, otherOwner, rule, undefined)).toBe('allowed');
      expect(
        await checkOwnership(repo, { userId: 'user-9', role: 'EVOwner' }, rule, undefined),
      ).toBe('forbidden');
    });

    it('skips the lookup for station users', async () => {
      const spy = vi.spyOn(repo, 'findByNic');
      expect(
        await checkOwnership(repo, { userId: 'op-1', role: 'StationUser' }, rule, '200098765432'),
      ).toBe('allowed');
      expect(spy).not.toHaveBeenCalled();
    });

    it('propagates lookup failures', async () => {
      vi.spyOn(repo, 'findByNic').mockRejectedValueOnce(new Error('timeout'));
      await expect(checkOwnership(repo, owner, rule, '199012345678')).rejects.toThrow('timeout');
    });
  });
});

describe('describeDevice', () => {
  it('classifies user agents', () => {
    expect(describeDevice('Mozilla/5.0 (iPad; CPU OS 17_0)')).toBe('Tablet');
    expect(describeDevice('Mozilla/5.0 (X11; Linux x86_64)')).toBe('Web Browser');
    expect(describeDevice('')).toBe('Unknown');
    expect(describeDevice(null)).toBe('Unknown');
  });
});
