/**
 * Mock Repository Factory
 * Layer: Test Helpers
 *
 * Creates a mock IDisclosureRepository where every method is a `jest.fn()`.
 * It looks like the real repository from the outside (same interface), but
 * instead of hitting PostgreSQL it records every call and returns whatever
 * the test configures.
 *
 *   const repo = createMockRepository();
 *   repo.findByIssueDateRange.mockResolvedValue([sampleCachedRecord]);
 *
 * A factory so each test gets fresh jest.fn() instances.
 */
import type { IDisclosureRepository } from '@domain/interfaces/IDisclosureRepository';

export type MockDisclosureRepository = {
  [K in keyof IDisclosureRepository]: jest.Mock;
};

export function createMockRepository(): MockDisclosureRepository {
  return {
    upsertMany: jest.fn(),
    findByIssueDateRange: jest.fn(),
  };
}
