import type { Decision } from '../reconcile.js';
import type { CertificateRequest } from './request.js';

export type CertificateAction = 'noop' | 'issue' | 'renew' | 'remove';

/**
 * What the host currently stores under a cert name. `domains` is only
 * set when the certificate's subjectAltName could be read.
 */
export interface ObservedCertificate {
  exists: boolean;
  expiryDate?: Date;
  domains?: string[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Decide what to do with a certificate. Pure and total.
 *
 * force_renew wins over every expiry consideration. The renewal window
 * is inclusive: with `renewBeforeDays` of 0 a certificate is renewed
 * once `now` reaches its expiry instant.
 */
export function decideCertificate(
  request: CertificateRequest,
  observed: ObservedCertificate,
  now: Date,
): Decision<CertificateAction> {
  const name = request.certName;

  if (request.state === 'absent') {
    return observed.exists
      ? { action: 'remove', reason: `certificate "${name}" exists` }
      : { action: 'noop', reason: `certificate "${name}" already absent` };
  }

  if (!observed.exists) {
    return {
      action: 'issue',
      reason: `no certificate stored under "${name}"`,
    };
  }

  if (request.forceRenew) {
    return { action: 'renew', reason: 'force_renew requested' };
  }

  if (observed.expiryDate === undefined) {
    return {
      action: 'renew',
      reason: `expiry date of "${name}" is unknown`,
    };
  }

  if (observed.domains !== undefined) {
    const covered = new Set(observed.domains);
    const missing = request.domains.filter((d) => !covered.has(d));
    if (missing.length > 0) {
      return {
        action: 'renew',
        reason: `certificate "${name}" does not cover ${missing.join(', ')}`,
      };
    }
  }

  const expiry = observed.expiryDate.toISOString();
  const remainingMs = observed.expiryDate.getTime() - now.getTime();
  if (remainingMs <= request.renewBeforeDays * DAY_MS) {
    return {
      action: 'renew',
      reason: `expires ${expiry}, within ${request.renewBeforeDays} day(s)`,
    };
  }

  return { action: 'noop', reason: `valid until ${expiry}` };
}
