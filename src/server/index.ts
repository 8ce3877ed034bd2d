/**
 * HTTP Server
 *
 * Binds the express app and resolves once the listener is ready.
 */

import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import { consoleLogger } from '../utils/logger.js';
import { createApp, type CreateAppOptions } from './app.js';

export { createApp, QueryRequestSchema, type CreateAppOptions } from './app.js';

export interface StartServerOptions extends CreateAppOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
}

export interface RunningServer {
  server: Server;
  /** Base URL with the port actually bound */
  url: string;
  close(): Promise<void>;
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const logger = options.logger ?? consoleLogger;
  const app = createApp(options);

  const server = await new Promise<Server>((resolve, reject) => {
    const listener = app.listen(options.port, options.host, () => resolve(listener));
    listener.once('error', reject);
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : options.port;
  const url = `http://${options.host}:${port}`;
  logger.info(`Codebase Intelligence API listening at ${url}`);

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
