/**
 * backend/src/modules/auth/helpers/build-email-link.ts
 *
 * Link carried by verify/reset emails: `${publicBaseUrl}${path}/${token}`.
 */

export function buildEmailLink(publicBaseUrl: string, path: string, token: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}${path}/${encodeURIComponent(token)}`;
}
