import { type RefreshTokenRecord } from './user';

export function isTokenExpired(expiresAt: Date, now: Date): boolean {
  return expiresAt.getTime() <= now.getTime();
}

export function isTokenActive(record: RefreshTokenRecord, now: Date): boolean {
  return !record.isRevoked && !record.isUsed && !isTokenExpired(record.expiresAt, now);
}

/**
 * Coarse device class derived from a user-agent string. Stored with each
 * refresh token so session listings can show where a login came from.
 */
export function describeDevice(userAgent: string | null | undefined): string {
  if (!userAgent || userAgent.trim() === '') return 'Unknown';

  const ua = userAgent.toLowerCase();
  if (ua.includes('mobile') || ua.includes('android') || ua.includes('iphone')) {
    return 'Mobile';
  }
  if (ua.includes('tablet') || ua.includes('ipad')) {
    return 'Tablet';
  }
  if (ua.includes('electron') || ua.includes('desktop')) {
    return 'Desktop App';
  }
  return 'Web Browser';
}
