import http from "node:http";

export type StubRoute = { status: number; body?: string; headers?: Record<string, string> } | "hang";

export type StubServer = {
  baseUrl: string;
  /** Request paths in arrival order. */
  hits: string[];
  close(): Promise<void>;
};

/** In-process HTTP server answering each path from a fixed table; unknown paths get 404. */
export async function startStubServer(routes: Record<string, StubRoute>): Promise<StubServer> {
  const hits: string[] = [];
  const server = http.createServer((req, res) => {
    const url = req.url ?? "/";
    hits.push(url);
    const route = routes[url];
    if (route === "hang") return;
    if (!route) {
      res.writeHead(404).end("not found");
      return;
    }
    res.writeHead(route.status, route.headers).end(route.body ?? "");
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("stub server has no TCP address");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    hits,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
