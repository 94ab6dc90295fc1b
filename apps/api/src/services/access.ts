import type { FastifyReply, FastifyRequest } from 'fastify';
import { sendError } from './errors.js';

export type AccessRole = 'public' | 'readonly' | 'operator' | 'admin';

const ROLE_LEVEL: Record<AccessRole, number> = {
  public: 0,
  readonly: 1,
  operator: 2,
  admin: 3
};

function configuredKeys() {
  return {
    admin: process.env.NEG_ADMIN_API_KEY?.trim() || undefined,
    operator: process.env.NEG_OPERATOR_API_KEY?.trim() || undefined,
    readonly: process.env.NEG_READONLY_API_KEY?.trim() || undefined
  };
}

function allowPublicRead(): boolean {
  return process.env.NEG_ALLOW_PUBLIC_READ !== 'false';
}

/** Without an admin or operator key the service runs open, as in local development. */
function accessEnforced(): boolean {
  const keys = configuredKeys();
  return Boolean(keys.admin || keys.operator);
}

function extractApiKey(req: FastifyRequest): string | undefined {
  const authHeader = req.headers.authorization;
  if (authHeader?.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }

  const xApiKey = req.headers['x-api-key'];
  if (typeof xApiKey === 'string') return xApiKey.trim();
  if (Array.isArray(xApiKey)) return xApiKey[0]?.trim();
  return undefined;
}

export function resolveAccessRole(req: FastifyRequest): AccessRole {
  if (!accessEnforced()) return 'admin';

  const keys = configuredKeys();
  const token = extractApiKey(req);

  if (!token) return allowPublicRead() ? 'readonly' : 'public';
  if (keys.admin && token === keys.admin) return 'admin';
  if (keys.operator && token === keys.operator) return 'operator';
  if (keys.readonly && token === keys.readonly) return 'readonly';
  return 'public';
}

export function requireRole(req: FastifyRequest, reply: FastifyReply, role: AccessRole): boolean {
  const actualRole = resolveAccessRole(req);
  if (ROLE_LEVEL[actualRole] >= ROLE_LEVEL[role]) return true;

  sendError(reply, 401, 'unauthorized', 'Insufficient role for this action', {
    requiredRole: role,
    currentRole: actualRole
  });
  return false;
}

export function authSummary() {
  const keys = configuredKeys();
  return {
    enforced: accessEnforced(),
    allowPublicRead: allowPublicRead(),
    hasAdminKey: Boolean(keys.admin),
    hasOperatorKey: Boolean(keys.operator),
    hasReadonlyKey: Boolean(keys.readonly)
  };
}
