import type { RequestHandler } from 'express';
import crypto from 'crypto';

const CLIENT_ID_PATTERN = /^[A-Za-z0-9_.:@-]{1,64}$/;

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Bearer-token guard for administrator routes. Without a configured token every admin
 * request is refused.
 */
export function isAdmin(adminToken: string | undefined): RequestHandler {
  return (req, res, next) => {
    const header = req.get('authorization') ?? '';
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match) {
      return res.status(401).json({ error: 'Unauthorized', code: 'UNAUTHORIZED', requestId: req.requestId });
    }
    if (!adminToken || !tokensMatch(adminToken, match[1].trim())) {
      return res.status(403).json({ error: 'Forbidden: Admin access required', code: 'FORBIDDEN', requestId: req.requestId });
    }
    return next();
  };
}

export const isClient: RequestHandler = (req, res, next) => {
  const clientId = req.get('x-client-id')?.trim();
  if (!clientId || !CLIENT_ID_PATTERN.test(clientId)) {
    return res.status(401).json({ error: 'X-Client-Id header required', code: 'UNAUTHORIZED', requestId: req.requestId });
  }
  req.clientId = clientId;
  return next();
};
