import { describe, it, expect, vi } from 'vitest';
import { runInTransaction } from '../client';

function createFakeConnection(failOn?: string) {
  const client = {
    query: vi.fn(async (text: string) => {
      if (text === failOn) throw new Error(`${text} failed`);
      return {};
    }),
    release: vi.fn((_err?: Error | boolean) => {}),
  };
  return { client, source: { connect: async () => client } };
}

describe('runInTransaction', () => {
  it('commits and returns the result', async () => {
    const { client, source } = createFakeConnection();

    const result = await runInTransaction(source, async () => 42);

    expect(result).toBe(42);
    expect(client.query.mock.calls.map(([text]) => text)).toEqual(['BEGIN', 'COMMIT']);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it('rolls back and rethrows the caller error', async () => {
    const { client, source } = createFakeConnection();

    await expect(
      runInTransaction(source, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(client.query.mock.calls.map(([text]) => text)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledWith(undefined);
  });

  it('keeps the caller error and discards the connection when rollback fails', async () => {
    const { client, source } = createFakeConnection('ROLLBACK');

    await expect(
      runInTransaction(source, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(client.release).toHaveBeenCalledWith(new Error('ROLLBACK failed'));
  });
});
