/**
 * Tests for unified singleton reset utility
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resetAll } from '../reset.js';
import { _clearEnvCache } from '../../config/env.js';
import { resetDatabase, closeDb } from '../../database/index.js';

vi.mock('../../config/env.js', () => ({
  _clearEnvCache: vi.fn(),
}));

vi.mock('../../database/index.js', () => ({
  resetDatabase: vi.fn(),
  closeDb: vi.fn(),
}));

describe('resetAll', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('calls all reset functions', () => {
    resetAll();

    expect(_clearEnvCache).toHaveBeenCalledTimes(1);
    expect(resetDatabase).toHaveBeenCalledTimes(1);
    expect(closeDb).toHaveBeenCalledTimes(1);
  });

  it('closes the connection last', () => {
    const callOrder: string[] = [];

    vi.mocked(_clearEnvCache).mockImplementation(() => {
      callOrder.push('env');
    });
    vi.mocked(resetDatabase).mockImplementation(() => {
      callOrder.push('database');
    });
    vi.mocked(closeDb).mockImplementation(() => {
      callOrder.push('closeDb');
    });

    resetAll();

    expect(callOrder).toEqual(['env', 'database', 'closeDb']);
  });
});
