import { describe, it, expect } from 'vitest';
import * as net from 'net';
import { allocatePort } from './ports.service';

describe('allocatePort', () => {
  it('returns a port that can be bound right away', async () => {
    const port = await allocatePort();
    expect(port).toBeGreaterThan(0);

    const server = net.createServer();
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => resolve());
    });
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });
});
