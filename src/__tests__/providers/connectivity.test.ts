import { type AddressInfo, createServer } from 'node:net';
import { describe, expect, test } from 'vitest';
import { hasInternetConnection, isLocalEndpoint } from '../../services/providers';

describe('isLocalEndpoint', () => {
  test.each([
    'http://localhost:8080/v1',
    'http://127.0.0.1:1234',
    'http://192.168.1.20:8000/v1',
    'http://10.0.0.5/v1',
  ])('%s is local', (endpoint) => {
    expect(isLocalEndpoint(endpoint)).toBe(true);
  });

  test.each(['https://api.openai.com/v1', 'http://172.16.0.1', undefined])('%s is not local', (endpoint) => {
    expect(isLocalEndpoint(endpoint)).toBe(false);
  });
});

describe('hasInternetConnection', () => {
  test('resolves true when the probe target accepts the connection', async () => {
    const server = createServer((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    const { port }: AddressInfo = address;

    try {
      expect(await hasInternetConnection('127.0.0.1', port, 1000)).toBe(true);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  test('resolves false when the connection is refused', async () => {
    const server = createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    const port = address.port;
    await new Promise<void>((resolve) => server.close(() => resolve()));

    expect(await hasInternetConnection('127.0.0.1', port, 1000)).toBe(false);
  });
});
