/**
 * @file src/session/identity.ts
 * @description Derives the caller identity that partitions sessions between tenants.
 *
 * Resolution order:
 * 1. `Bearer <token>`: the subject (`sub`, else `user_id`) read from the token payload
 *    without verification. Upstream auth has already verified the token; this only
 *    extracts who it names. Unreadable claims fall back to a digest of the token's
 *    leading characters.
 * 2. `ApiKey <key>`: a digest of the key. The key itself is never kept.
 * 3. Anything else: a digest of client IP and user agent.
 *
 * Resolution is pure and never fails; unusable input degrades to the next rule.
 */

import { createHash } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import { logger } from '../logger.js';
import { MalformedIdentityInputError } from '../types.js';
import type { RequestMetadata, SessionOwner, UserIdentity } from '../types.js';

const UNKNOWN = 'unknown';

/** Number of leading token characters hashed into a fallback JWT user id. */
const TOKEN_PREFIX_LENGTH = 32;

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Fixed-length partition key for an identity. Only `userId`, `userType` and
 * `authMethod` take part; the two enum fields never contain `:`, so distinct triples
 * always produce distinct inputs.
 */
export function identityHash(identity: Pick<UserIdentity, 'userId' | 'userType' | 'authMethod'>): string {
  return sha256(`${identity.userId}:${identity.userType}:${identity.authMethod}`).slice(0, 32);
}

/** The identity fields stored alongside a session. */
export function sessionOwner(identity: UserIdentity): SessionOwner {
  return {
    userId: identity.userId,
    userType: identity.userType,
    authMethod: identity.authMethod,
  };
}

/**
 * Decodes the payload segment of a JWT without checking its signature.
 * @throws {MalformedIdentityInputError} If the token has no decodable JSON object payload.
 */
export function readUnverifiedClaims(token: string): Record<string, unknown> {
  const payloadSegment = token.split('.')[1];
  if (!payloadSegment) {
    throw new MalformedIdentityInputError('Bearer token is not a JWT');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(Buffer.from(payloadSegment, 'base64url').toString('utf8'));
  } catch {
    throw new MalformedIdentityInputError('Bearer token payload is not JSON');
  }

  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new MalformedIdentityInputError('Bearer token payload is not an object');
  }
  return Object.fromEntries(Object.entries(payload));
}

function subjectFromToken(token: string): string {
  try {
    const claims = readUnverifiedClaims(token);
    const subject = claims['sub'] ?? claims['user_id'];
    if (typeof subject === 'string' && subject.trim() !== '') {
      return subject;
    }
    if (typeof subject === 'number') {
      return String(subject);
    }
  } catch (error) {
    if (!(error instanceof MalformedIdentityInputError)) {
      throw error;
    }
    logger.debug(`Falling back to token digest identity: ${error.message}`);
  }
  return `jwt_user_${sha256(token.slice(0, TOKEN_PREFIX_LENGTH)).slice(0, 12)}`;
}

/**
 * @summary Resolves request metadata into a `UserIdentity`.
 * @param metadata Raw identity input; every field is optional.
 */
export function resolveIdentity(metadata: RequestMetadata): UserIdentity {
  const clientIp = present(metadata.clientIp) ?? UNKNOWN;
  const userAgent = present(metadata.userAgent) ?? UNKNOWN;
  const credential = present(metadata.authorization);

  const bearer = credential ? /^Bearer\s+(\S+)$/i.exec(credential) : null;
  if (bearer?.[1]) {
    return {
      userId: subjectFromToken(bearer[1]),
      userType: 'authenticated_user',
      authMethod: 'jwt',
      metadata: { client_ip: clientIp, user_agent: userAgent, auth_method: 'jwt' },
    };
  }

  const apiKey = credential ? /^ApiKey\s+(\S+)$/i.exec(credential) : null;
  if (apiKey?.[1]) {
    const keyDigest = sha256(apiKey[1]);
    return {
      userId: `api_user_${keyDigest.slice(0, 12)}`,
      userType: 'service_account',
      authMethod: 'api_key',
      metadata: { client_ip: clientIp, user_agent: userAgent, api_key_hash: keyDigest.slice(0, 8) },
    };
  }

  return {
    userId: `anonymous_${sha256(`${clientIp}:${userAgent}`).slice(0, 12)}`,
    userType: 'anonymous',
    authMethod: 'anonymous',
    metadata: { client_ip: clientIp, user_agent: userAgent },
  };
}

/** Builds `RequestMetadata` from incoming HTTP headers and the remote address. */
export function requestMetadataFromHeaders(headers: IncomingHttpHeaders, clientIp?: string): RequestMetadata {
  return {
    authorization: headers.authorization,
    userAgent: headers['user-agent'],
    clientIp,
  };
}
