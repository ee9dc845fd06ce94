import { Throttle } from '@nestjs/throttler';

/**
 * Strict rate limiting for endpoints that fan out to third-party APIs.
 * Limits: 60 requests per minute per client
 *
 * Use for:
 * - Geolocation with address and panorama enrichment
 */
export const StrictThrottle = () => Throttle({ default: { ttl: 60000, limit: 60 } });

/**
 * Relaxed rate limiting for endpoints that only compute.
 * Limits: 600 requests per minute per client
 *
 * Use for:
 * - Bearing-only estimation
 */
export const RelaxedThrottle = () => Throttle({ default: { ttl: 60000, limit: 600 } });
