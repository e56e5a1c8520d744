import { type Role, type AccessTokenClaims } from './user';
import { type EvOwnerRepository } from './ports';

export function hasAnyRole(role: Role, allowed: readonly Role[]): boolean {
  return allowed.length === 0 || allowed.includes(role);
}

/** Back-office roles see every account; EV owners only their own. */
export function bypassesOwnership(role: Role): boolean {
  return role === 'Admin' || role === 'StationUser';
}

export type OwnershipRule =
  | { kind: 'userId'; param: string }
  | { kind: 'nic'; param: string };

export type OwnershipDecision = 'allowed' | 'forbidden';

/**
 * Decides whether the caller may act on the resource named by `value`.
 * `value` is undefined when the request did not carry the parameter.
 */
export async function checkOwnership(
  evOwnerRepo: EvOwnerRepository,
  caller: AccessTokenClaims,
  rule: OwnershipRule,
  value: string | undefined,
): Promise<OwnershipDecision> {
  if (bypassesOwnership(caller.role)) return 'allowed';

  if (rule.kind === 'userId') {
    return value !== undefined && value === caller.userId ? 'allowed' : 'forbidden';
  }

  if (value === undefined || value === '') {
    const linked = await evOwnerRepo.findByUserId(caller.userId);
    return linked ? 'allowed' : 'forbidden';
  }

  const profile = await evOwnerRepo.findByNic(value);
  return profile?.userId === caller.userId ? 'allowed' : 'forbidden';
}
