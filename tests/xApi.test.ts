import { describe, it, expect, vi } from 'vitest';
import { TwitterApi } from 'twitter-api-v2';
import { XApiTransport } from '../src/collectors/x-api.js';

describe('XApiTransport.resolveAccount()', () => {
  it('looks each handle up once', async () => {
    const client = new TwitterApi('test-bearer-token');
    const lookup = vi
      .spyOn(client.v2, 'userByUsername')
      .mockResolvedValue({ data: { id: '42', name: 'Alice', username: 'alice' } });
    const transport = new XApiTransport({ client });

    expect(await transport.resolveAccount('alice')).toBe('42');
    expect(await transport.resolveAccount('alice')).toBe('42');
    expect(lookup).toHaveBeenCalledTimes(1);
  });
});
