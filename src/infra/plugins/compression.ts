/**
 * Response Compression Plugin
 *
 * gzip/deflate/brotli via @fastify/compress, negotiated from Accept-Encoding.
 * Media types that are already compressed are left alone by the plugin's
 * compressibility check.
 */

import compress from '@fastify/compress';

import type { FastifyInstance } from 'fastify';

/** Smaller bodies are sent as they are */
export const COMPRESSION_THRESHOLD_BYTES = 1024;

export async function registerCompression(fastify: FastifyInstance): Promise<void> {
  await fastify.register(compress, {
    global: true,
    threshold: COMPRESSION_THRESHOLD_BYTES,
    encodings: ['br', 'gzip', 'deflate'],
  });
}
