import http from 'node:http';

// Classic results markup: every organic hit is an <h3 class="r"> wrapping a redirect link
export function resultsPage(targets: string[]): string {
  const items = targets
    .map((t) => `<div class="g"><h3 class="r"><a href="/url?q=${t}&amp;sa=U&amp;ved=0ahUKE">${t}</a></h3></div>`)
    .join('\n');
  return `<!doctype html><html><body><div id="search">${items}</div></body></html>`;
}

export type TestServer = {
  baseUrl: string;
  close(): Promise<void>;
};

export async function startServer(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP listener');
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}

// A port nothing listens on any more
export async function closedPortUrl(): Promise<string> {
  const srv = await startServer((_req, res) => res.end());
  const url = `${srv.baseUrl}/gone.pdf`;
  await srv.close();
  return url;
}
