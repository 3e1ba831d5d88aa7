import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import net from 'net';
import { DirectDialer, SocksDialer, createDialer } from '../../src/concerns/dialer.js';

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : 0);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

function ping(socket: net.Socket): Promise<string> {
  return new Promise((resolve) => {
    socket.once('data', (chunk) => resolve(chunk.toString()));
    socket.write('ping\n');
  });
}

/** Minimal no-auth SOCKS5 proxy supporting CONNECT to IPv4 and domain targets */
function createSocksServer(requests: string[]): net.Server {
  return net.createServer((client) => {
    let stage: 'greeting' | 'request' | 'piping' = 'greeting';

    client.on('data', (chunk) => {
      if (stage === 'greeting') {
        stage = 'request';
        client.write(Buffer.from([0x05, 0x00]));
        return;
      }

      if (stage === 'request') {
        stage = 'piping';
        const atyp = chunk[3];
        const host = atyp === 0x01
          ? [...chunk.subarray(4, 8)].join('.')
          : chunk.subarray(5, 5 + (chunk[4] ?? 0)).toString();
        const port = chunk.readUInt16BE(chunk.length - 2);
        requests.push(`${host}:${port}`);

        const upstream = net.connect({ host, port }, () => {
          client.write(Buffer.from([0x05, 0x00, 0x00, 0x01, 0, 0, 0, 0, 0, 0]));
          client.pipe(upstream).pipe(client);
        });
        upstream.on('error', () => client.destroy());
      }
    });
    client.on('error', () => client.destroy());
  });
}

describe('createDialer', () => {
  it('should dial directly without a proxy', () => {
    expect(createDialer()).toBeInstanceOf(DirectDialer);
    expect(createDialer(null).name).toBe('direct');
  });

  it('should dial through SOCKS5 with a proxy', () => {
    const dialer = createDialer({ host: '127.0.0.1', port: 9050 });
    expect(dialer).toBeInstanceOf(SocksDialer);
    expect(dialer.name).toBe('socks5://127.0.0.1:9050');
  });
});

describe('dialers against local servers', () => {
  let target: net.Server;
  let targetPort: number;

  beforeEach(async () => {
    target = net.createServer((socket) => {
      socket.once('data', () => socket.end('hello from target\n'));
    });
    targetPort = await listen(target);
  });

  afterEach(async () => {
    await close(target);
  });

  it('DirectDialer should open a plain TCP connection', async () => {
    const socket = await new DirectDialer().dial({ host: '127.0.0.1', port: targetPort, timeout: 2000 });
    expect(await ping(socket)).toBe('hello from target\n');
    socket.destroy();
  });

  it('DirectDialer should reject when nothing listens', async () => {
    const probe = net.createServer();
    const port = await listen(probe);
    await close(probe);

    await expect(new DirectDialer().dial({ host: '127.0.0.1', port, timeout: 2000 })).rejects.toThrow();
  });

  it('SocksDialer should tunnel through the proxy to the destination', async () => {
    const requests: string[] = [];
    const proxy = createSocksServer(requests);
    const proxyPort = await listen(proxy);

    const socket = await new SocksDialer({ host: '127.0.0.1', port: proxyPort })
      .dial({ host: '127.0.0.1', port: targetPort, timeout: 2000 });

    expect(await ping(socket)).toBe('hello from target\n');
    expect(requests).toEqual([`127.0.0.1:${targetPort}`]);

    socket.destroy();
    proxy.close();
  });
});
