/**
 * CORS plugin for Fastify
 * Allowed origins come from ALLOWED_ORIGINS and CLIENT_BASE_URL
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/index.js';
import type { FastifyInstance } from 'fastify';

/**
 * Set of allowed origins from configuration
 */
export function getAllowedOrigins(config: AppConfig): Set<string> {
  const origins = new Set<string>();

  // Parse comma-separated ALLOWED_ORIGINS
  if (config.cors.allowedOrigins !== undefined) {
    config.cors.allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((origin) => origins.add(origin));
  }

  if (config.cors.clientBaseUrl !== undefined && config.cors.clientBaseUrl.trim() !== '') {
    origins.add(config.cors.clientBaseUrl.trim());
  }

  return origins;
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server and same-origin requests carry no Origin
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      // Development additionally accepts any localhost origin
      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-api-key', 'mcp-protocol-version'],
  });
}
