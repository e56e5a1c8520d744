import { type Role } from './user';

export type AuthenticationFailure =
  | 'invalid_credentials'
  | 'user_inactive'
  | 'ev_owner_deactivated'
  | 'user_not_found'
  | 'failed';

export type TokenRefreshFailure =
  | 'invalid_refresh_token'
  | 'user_inactive'
  | 'user_not_found'
  | 'failed';

export const AUTHENTICATION_MESSAGES: Record<AuthenticationFailure, string> = {
  invalid_credentials: 'Invalid username or password',
  user_inactive: 'User account is inactive',
  ev_owner_deactivated:
    'Your EV Owner account has been deactivated. Please contact a back-office officer for reactivation.',
  user_not_found: 'User not found',
  failed: 'Authentication failed',
};

export const TOKEN_REFRESH_MESSAGES: Record<TokenRefreshFailure, string> = {
  invalid_refresh_token: 'Invalid refresh token',
  user_inactive: 'User account is inactive',
  user_not_found: 'User not found',
  failed: 'Token refresh failed',
};

export interface RefreshTokenPair {
  tokenId: string;
  secret: string;
}

export interface UserInfo {
  id: string;
  username: string;
  email: string;
  role: Role;
  chargingStationId: string | null;
  nic: string | null;
}

export type AuthenticationOutcome =
  | {
      status: 'success';
      accessToken: string;
      refreshToken: RefreshTokenPair;
      user: UserInfo;
    }
  | { status: AuthenticationFailure; message: string };

export type TokenRefreshOutcome =
  | {
      status: 'success';
      accessToken: string;
      refreshToken: RefreshTokenPair;
    }
  | { status: TokenRefreshFailure; message: string };

export function authenticationFailure(status: AuthenticationFailure): AuthenticationOutcome {
  return { status, message: AUTHENTICATION_MESSAGES[status] };
}

export function tokenRefreshFailure(status: TokenRefreshFailure): TokenRefreshOutcome {
  return { status, message: TOKEN_REFRESH_MESSAGES[status] };
}
