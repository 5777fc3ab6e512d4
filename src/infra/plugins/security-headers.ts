/**
 * Security Headers Plugin
 *
 * Configures HTTP security headers using @fastify/helmet.
 *
 * The dashboard that consumes this API is commonly embedded in an iframe, so
 * framing is governed by the `frame-ancestors` directive taken from
 * configuration instead of a blanket X-Frame-Options: DENY.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * HSTS configuration.
 * 1 year max-age with subdomains included.
 */
const HSTS_CONFIG = {
  maxAge: 31536000, // 1 year in seconds
  includeSubDomains: true,
  preload: false,
};

/**
 * CSP directives for a JSON-only API; only framing is configurable.
 */
export const buildCspDirectives = (frameAncestors: readonly string[]) => ({
  defaultSrc: ["'self'"],
  objectSrc: ["'none'"],
  formAction: ["'self'"],
  frameAncestors: frameAncestors.length > 0 ? [...frameAncestors] : ["'none'"],
});

// ─────────────────────────────────────────────────────────────────────────────
// Plugin
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registers HTTP security headers plugin.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  // Skip in test environment for easier testing
  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  const { frameAncestors } = config.security;

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      useDefaults: false,
      directives: buildCspDirectives(frameAncestors),
    },
    dnsPrefetchControl: { allow: false },
    // frame-ancestors supersedes X-Frame-Options when embedding is allowed
    frameguard: frameAncestors.length > 0 ? false : { action: 'deny' },
    hsts: isProduction ? HSTS_CONFIG : false,
    permittedCrossDomainPolicies: { permittedPolicies: 'none' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    xssFilter: false,
    hidePoweredBy: true,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });

  fastify.log.info({ frameAncestors }, 'Security headers plugin registered');
}
