import { afterAll, beforeEach } from 'vitest';
import { Logger } from '@tonearm/logging';

// Loggers built without explicit transports write nowhere during tests.
// Test files that configure the logger themselves run after this hook.
beforeEach(() => {
	Logger.configure({ transports: [] });
});

afterAll(async () => {
	await Logger.shutdown();
	Logger.reset();
});
