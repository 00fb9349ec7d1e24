import { vi, type Mock } from 'vitest';

export interface MockDb {
  select: Mock;
  from: Mock;
  where: Mock;
  limit: Mock;
  offset: Mock;
  orderBy: Mock;
  $dynamic: Mock;
  insert: Mock;
  values: Mock;
  returning: Mock;
  update: Mock;
  set: Mock;
  delete: Mock;
  execute: Mock;
  then: undefined;
}

/**
 * Drizzle query-chain stand-in: every builder step returns the mock itself,
 * so a test only stubs the terminal call of the chain under test.
 */
export function createMockDb(): MockDb {
  const db: MockDb = {
    select: vi.fn(() => db),
    from: vi.fn(() => db),
    where: vi.fn(() => db),
    limit: vi.fn(() => db),
    offset: vi.fn(() => db),
    orderBy: vi.fn(() => db),
    $dynamic: vi.fn(() => db),
    insert: vi.fn(() => db),
    values: vi.fn(() => db),
    returning: vi.fn().mockResolvedValue([]),
    update: vi.fn(() => db),
    set: vi.fn(() => db),
    delete: vi.fn(() => db),
    execute: vi.fn().mockResolvedValue({ rows: [] }),
    then: undefined,
  };
  return db;
}
