export { ROLES, REVOCATION_REASONS, isRole, isRevocationReason } from './user';
export type {
  Role,
  User,
  EvOwnerProfile,
  RefreshTokenRecord,
  RevocationReason,
  ClientContext,
  AccessTokenClaims,
} from './user';
export { isTokenExpired, isTokenActive, describeDevice } from './auth';
export type {
  UserRepository,
  EvOwnerRepository,
  RefreshTokenRepository,
  PasswordHasher,
  TokenService,
} from './ports';
export {
  AUTHENTICATION_MESSAGES,
  TOKEN_REFRESH_MESSAGES,
  authenticationFailure,
  tokenRefreshFailure,
} from './outcomes';
export type {
  AuthenticationFailure,
  TokenRefreshFailure,
  AuthenticationOutcome,
  TokenRefreshOutcome,
  RefreshTokenPair,
  UserInfo,
} from './outcomes';
export { RefreshTokenLedger } from './refresh-token-ledger';
export type {
  RefreshTokenLedgerDeps,
  IssuedRefreshToken,
  ConsumeRejection,
  ConsumeResult,
  RotateResult,
  SessionSummary,
} from './refresh-token-ledger';
export { AuthService, type AuthServiceDeps } from './auth-service';
export { hasAnyRole, bypassesOwnership, checkOwnership } from './permissions';
export type { OwnershipRule, OwnershipDecision } from './permissions';
