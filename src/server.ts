import { serve as nodeServe } from "@hono/node-server";

export type ServeOptions = {
  fetch: (request: Request) => Response | Promise<Response>;
  port: number;
  hostname: string;
};

export type RunningServer = {
  close: (callback?: (error?: Error) => void) => unknown;
};

export type StartServerOptions = ServeOptions & {
  serve?: (options: ServeOptions) => RunningServer;
};

export function startServer(options: StartServerOptions): RunningServer {
  const serve = options.serve ?? ((serveOptions: ServeOptions) => nodeServe(serveOptions));
  return serve({ fetch: options.fetch, port: options.port, hostname: options.hostname });
}

export function closeServer(server: RunningServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
