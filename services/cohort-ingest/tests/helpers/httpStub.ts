import { createServer } from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';

export type StubHandler = (request: IncomingMessage, url: URL, response: ServerResponse, body: string) => void;

export type StubRequest = {
  method: string;
  url: URL;
  body: string;
};

export type HttpStub = {
  baseUrl: string;
  requests: URL[];
  calls: StubRequest[];
  close(): Promise<void>;
};

export async function startHttpStub(handler: StubHandler): Promise<HttpStub> {
  const requests: URL[] = [];
  const calls: StubRequest[] = [];
  const server = createServer((request, response) => {
    const url = new URL(request.url ?? '/', 'http://127.0.0.1');
    const chunks: Buffer[] = [];
    request.on('data', (chunk: Buffer) => chunks.push(chunk));
    request.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      requests.push(url);
      calls.push({ method: request.method ?? 'GET', url, body });
      handler(request, url, response, body);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Stub server has no TCP address');
  }
  const { port } = address;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    calls,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

export function sendJson(response: ServerResponse, status: number, payload: unknown): void {
  response.writeHead(status, { 'content-type': 'application/json' });
  response.end(JSON.stringify(payload));
}
