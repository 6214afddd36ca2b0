/**
 * Tonearm - cached, fault-tolerant settings access for the Tonearm media library
 *
 * This file re-exports all packages for convenience. For smaller bundles,
 * import directly from individual packages:
 *
 * @example
 * import { createSettingsLayer } from '@tonearm/settings';
 * import { Logger } from '@tonearm/logging';
 * import { SingleFlightCache } from '@tonearm/cache';
 */

export * from '@tonearm/settings';

export * from '@tonearm/store';

export * from '@tonearm/cache';

export * from '@tonearm/events';

export * from '@tonearm/config';

export * from '@tonearm/logging';

// Both cache and store declare a Clock with the same shape
export type { Clock } from '@tonearm/store';
