import { type User, type ClientContext } from './user';
import {
  type UserRepository,
  type EvOwnerRepository,
  type PasswordHasher,
  type TokenService,
} from './ports';
import { type RefreshTokenLedger, type SessionSummary } from './refresh-token-ledger';
import {
  type AuthenticationOutcome,
  type TokenRefreshOutcome,
  type UserInfo,
  authenticationFailure,
  tokenRefreshFailure,
} from './outcomes';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AuthServiceDeps {
  userRepo: UserRepository;
  evOwnerRepo: EvOwnerRepository;
  passwordHasher: PasswordHasher;
  tokenService: TokenService;
  ledger: RefreshTokenLedger;
  now: () => Date;
  /** How long revoked and used refresh tokens are kept before cleanup deletes them. */
  revokedTokenRetentionDays: number;
}

/**
 * Expected failures come back as outcome values. Store or signing failures
 * reject, and callers report them as `failed`.
 */
export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async login(
    username: string,
    password: string,
    context: ClientContext = {},
  ): Promise<AuthenticationOutcome> {
    const { userRepo, passwordHasher, tokenService, ledger } = this.deps;

    const user = await userRepo.findByLogin(username);
    if (!user) {
      return authenticationFailure('user_not_found');
    }

    const valid = await passwordHasher.verify(password, user.passwordHash);
    if (!valid) {
      return authenticationFailure('invalid_credentials');
    }

    if (!user.isActive) {
      return authenticationFailure(await this.inactiveStatus(user));
    }

    const issued = await ledger.issue(user.id, context);
    const accessToken = await tokenService.signAccessToken({ userId: user.id, role: user.role });

    return {
      status: 'success',
      accessToken,
      refreshToken: { tokenId: issued.tokenId, secret: issued.secret },
      user: await this.toUserInfo(user),
    };
  }

  async refresh(
    tokenId: string,
    secret: string,
    context: ClientContext = {},
  ): Promise<TokenRefreshOutcome> {
    const { userRepo, tokenService, ledger } = this.deps;

    const consumed = await ledger.consume(tokenId, secret);
    if (!consumed.ok) {
      return tokenRefreshFailure('invalid_refresh_token');
    }

    const { record } = consumed;
    const user = await userRepo.findById(record.userId);
    if (!user) {
      await ledger.revokeFamily(record.familyId, 'user_not_found');
      return tokenRefreshFailure('user_not_found');
    }
    if (!user.isActive) {
      await ledger.revokeFamily(record.familyId, 'user_inactive');
      return tokenRefreshFailure('user_inactive');
    }

    const issued = await ledger.issueSuccessor(record, context);
    const accessToken = await tokenService.signAccessToken({ userId: user.id, role: user.role });

    return {
      status: 'success',
      accessToken,
      refreshToken: { tokenId: issued.tokenId, secret: issued.secret },
    };
  }

  /** Revokes only the presented token. Unknown tokens and wrong secrets are ignored. */
  async logout(tokenId: string, secret: string): Promise<void> {
    await this.deps.ledger.revokeWithSecret(tokenId, secret, 'logout');
  }

  async logoutAll(userId: string): Promise<number> {
    return this.deps.ledger.revokeAllForUser(userId, 'logout_all');
  }

  async listSessions(userId: string): Promise<SessionSummary[]> {
    return this.deps.ledger.listActiveSessions(userId);
  }

  async revokeSession(userId: string, tokenId: string): Promise<boolean> {
    return this.deps.ledger.revokeSession(userId, tokenId);
  }

  async getUserInfo(userId: string): Promise<UserInfo | null> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user) return null;
    return this.toUserInfo(user);
  }

  async cleanupExpiredTokens(): Promise<number> {
    const olderThan = new Date(
      this.deps.now().getTime() - this.deps.revokedTokenRetentionDays * DAY_MS,
    );
    return this.deps.ledger.cleanup(olderThan);
  }

  private async inactiveStatus(user: User): Promise<'user_inactive' | 'ev_owner_deactivated'> {
    if (user.role !== 'EVOwner') return 'user_inactive';
    const profile = await this.deps.evOwnerRepo.findByUserId(user.id);
    return profile ? 'ev_owner_deactivated' : 'user_inactive';
  }

  private async toUserInfo(user: User): Promise<UserInfo> {
    const profile =
      user.role === 'EVOwner' ? await this.deps.evOwnerRepo.findByUserId(user.id) : null;

    return {
      id: user.id,
      username: user.username,
      email: user.email,
      role: user.role,
      chargingStationId: user.chargingStationId,
      nic: profile?.nic ?? null,
    };
  }
}
