/**
 * Global Test Setup
 * 
 * Configures test environment and resets mocks between tests.
 */

import { afterEach, beforeEach, vi } from 'vitest';
import { resetPgMock, setupPgDefaults } from './mocks/pg.mock.js';

// ========================================
// MOCK RESET
// ========================================

beforeEach(() => {
    // Clear all vi.fn() mocks
    vi.clearAllMocks();

    // Reset PostgreSQL mock
    resetPgMock();
    setupPgDefaults();
});

afterEach(() => {
    vi.unstubAllGlobals();
});
