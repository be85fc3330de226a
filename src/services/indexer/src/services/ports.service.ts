/**
 * Ports Service
 *
 * Ephemeral port allocation for static servers and launched apps.
 */

import * as net from 'net';

/**
 * Bind a transient socket to port 0 on loopback, read back the port the OS
 * picked, release the socket and return the number.
 * Failures (e.g. descriptor exhaustion) propagate to the caller unretried.
 */
export function allocatePort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.unref();
    probe.once('error', reject);
    probe.listen(0, host, () => {
      const address = probe.address();
      if (address === null || typeof address === 'string') {
        probe.close(() => reject(new Error('Could not read back an allocated port')));
        return;
      }
      const { port } = address;
      probe.close((err) => (err ? reject(err) : resolve(port)));
    });
  });
}
