import type express from 'express';
import { createServer, type Server } from 'node:http';

/**
 * Listen on `port` and resolve once bound.
 */
export function startHTTPServer(app: express.Application, port: number, name: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[${name}] Listening on port ${port}`);
      resolve(server);
    });
  });
}

export function stopHTTPServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
