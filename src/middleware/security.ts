/**
 * Security Middleware
 *
 * Response hardening for a JSON-only API: helmet headers and CORS limited to
 * the configured origins.
 *
 * @module middleware/security
 */

import helmet from 'helmet';
import cors from 'cors';
import type { AppConfig } from '../config/env';

export type SecurityConfig = AppConfig['security'];

/**
 * Helmet with a locked-down CSP; the API serves no HTML, scripts or frames.
 */
export function createSecurityHeadersMiddleware() {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"]
      }
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    referrerPolicy: { policy: 'no-referrer' }
  });
}

export function createCorsMiddleware(config: Pick<SecurityConfig, 'allowedOrigins' | 'corsCredentials'>) {
  const { allowedOrigins, corsCredentials } = config;
  const anyOrigin = allowedOrigins.includes('*');

  return cors({
    origin: (origin, callback) => {
      // Same-origin and non-browser callers send no Origin header
      if (!origin || anyOrigin || allowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
    credentials: corsCredentials,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400
  });
}
