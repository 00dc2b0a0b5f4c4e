const AMZ_DATE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

/** Longest lifetime SigV4 accepts for a presigned URL: seven days. */
export const MAX_SIGNED_URL_SECONDS = 604800;

/**
 * Expiry embedded in a SigV4 presigned URL: `X-Amz-Date` plus
 * `X-Amz-Expires` seconds. Undefined when the URL carries neither.
 */
export function signedUrlExpiry(url: string): Date | undefined {
  let params: URLSearchParams;
  try {
    params = new URL(url).searchParams;
  } catch {
    return undefined;
  }
  const match = AMZ_DATE.exec(params.get('X-Amz-Date') ?? '');
  const expires = Number(params.get('X-Amz-Expires') ?? Number.NaN);
  if (!match || !Number.isInteger(expires) || expires < 0) return undefined;

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const signedAt = Date.UTC(year, month - 1, day, hour, minute, second);
  return new Date(signedAt + expires * 1000);
}

export function isSignedUrlValid(url: string, now: number = Date.now()): boolean {
  const expiresAt = signedUrlExpiry(url);
  return expiresAt !== undefined && now < expiresAt.getTime();
}
