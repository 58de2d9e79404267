// Both http.Server and the http2 servers @hono/node-server can return fit this
export interface ClosableServer {
  close(callback: (err?: Error) => void): unknown;
}

export function closeServer(server: ClosableServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

// Stop accepting connections and let in-flight requests finish before the
// resources they use are released, in order.
export async function shutdown(
  server: ClosableServer,
  resources: Array<() => Promise<unknown>>,
): Promise<void> {
  await closeServer(server);
  for (const close of resources) {
    await close();
  }
}
