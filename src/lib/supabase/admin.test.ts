import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createAdminClient } from './admin';
import { AppError } from '@/src/lib/errors/app-error';

describe('createAdminClient', () => {
  it('builds a client on runtimes without a global WebSocket', () => {
    const client = createAdminClient({
      url: 'http://localhost:54321',
      serviceRoleKey: 'test-service-key',
      memoryTable: 'memory_items',
    });

    assert.ok(client.realtime);
    assert.strictEqual(typeof client.from, 'function');
  });

  it('requires the URL and the service role key', () => {
    assert.throws(
      () => createAdminClient({ url: 'http://localhost:54321', memoryTable: 'memory_items' }),
      (error: unknown) => error instanceof AppError && error.code === 'CONFIG_ERROR',
    );
  });
});
