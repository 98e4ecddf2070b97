/**
 * Authentication Plugin
 * JWT-based identity with role-based access control.
 *
 * The identity collaborator issues the token; the circulation core trusts the
 * userId and role it carries and performs no credential checks of its own.
 */

import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import { z } from 'zod';
import { MemberRole, type Actor } from '@circulation/domain';
import { forbidden } from '../lib/errors.js';
import { fail, failWithError } from '../utils/reply.js';

export const JwtPayloadSchema = z.object({
  userId: z.string().min(1).max(64),
  role: MemberRole,
});
export type JwtPayload = z.infer<typeof JwtPayloadSchema>;

// Extend @fastify/jwt module to type the user property
declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: JwtPayload;
    user: JwtPayload;
  }
}

export async function registerAuth(fastify: FastifyInstance, secret: string): Promise<void> {
  await fastify.register(fastifyJwt, {
    secret,
    sign: {
      expiresIn: '24h',
    },
  });
}

/**
 * The caller as the engine sees it.
 */
export function actorOf(request: FastifyRequest): Actor {
  return { userId: request.user.userId, role: request.user.role };
}

// ============================================================================
// Authorization helpers (preHandler functions)
// ============================================================================

/**
 * Require ANY of the listed roles.
 */
export function requireRoles(...allowedRoles: MemberRole[]) {
  return async function (request: FastifyRequest, reply: FastifyReply) {
    try {
      await request.jwtVerify();
    } catch {
      request.log.warn({ code: 'AUTH_FAILED', method: request.method, url: request.url }, 'Authentication failed');
      return fail(reply, 'UNAUTHENTICATED', 'Authentication required', 401, undefined, request.requestId);
    }

    // Tokens from an older issuer may lack fields; treat them as unauthenticated
    const identity = JwtPayloadSchema.safeParse(request.user);
    if (!identity.success) {
      request.log.warn({ code: 'AUTH_FAILED', method: request.method, url: request.url }, 'Token payload is not a circulation identity');
      return fail(reply, 'UNAUTHENTICATED', 'Authentication required', 401, undefined, request.requestId);
    }

    if (!allowedRoles.includes(identity.data.role)) {
      request.log.warn({ code: 'AUTHZ_DENIED', userId: identity.data.userId, requiredRoles: allowedRoles }, 'Authorization denied — missing roles');
      return failWithError(reply, forbidden('ADMIN_ONLY', `Required roles: ${allowedRoles.join(', ')}`), request.requestId);
    }
  };
}

// Pre-built role checks
export const requireMember = requireRoles('MEMBER', 'ADMIN');
export const requireAdmin = requireRoles('ADMIN');
