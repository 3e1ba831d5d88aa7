import net from 'net';
import { SocksClient } from 'socks';

export interface DialOptions {
  host: string;
  port: number;
  timeout: number;
}

/**
 * Opens the raw TCP connection an HTTP request rides on. The HTTP client
 * layers TLS on top when the target is https, so a dialer only decides the
 * route the bytes take.
 */
export interface Dialer {
  readonly name: string;
  dial(options: DialOptions): Promise<net.Socket>;
}

export class DirectDialer implements Dialer {
  readonly name = 'direct';

  dial({ host, port, timeout }: DialOptions): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.connect({ host, port });

      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };

      socket.setTimeout(timeout, () => {
        onError(new Error(`connect to ${host}:${port} timed out after ${timeout}ms`));
      });
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.setTimeout(0);
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }
}

export interface SocksDialerOptions {
  host: string;
  port: number;
  userId?: string;
  password?: string;
}

/**
 * Routes every connection through a SOCKS5 proxy (a local Tor daemon on
 * 127.0.0.1:9050 being the usual case). Hostnames are resolved by the proxy.
 */
export class SocksDialer implements Dialer {
  readonly name: string;
  private proxyHost: string;
  private proxyPort: number;
  private userId?: string;
  private password?: string;

  constructor(options: SocksDialerOptions) {
    this.proxyHost = options.host;
    this.proxyPort = options.port;
    this.userId = options.userId;
    this.password = options.password;
    this.name = `socks5://${options.host}:${options.port}`;
  }

  async dial({ host, port, timeout }: DialOptions): Promise<net.Socket> {
    const { socket } = await SocksClient.createConnection({
      proxy: {
        host: this.proxyHost,
        port: this.proxyPort,
        type: 5,
        userId: this.userId,
        password: this.password
      },
      command: 'connect',
      destination: { host, port },
      timeout
    });
    return socket;
  }
}

export function createDialer(proxy?: { host: string; port: number } | null): Dialer {
  return proxy ? new SocksDialer(proxy) : new DirectDialer();
}
