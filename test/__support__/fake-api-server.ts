/**
 * Minimal cluster API endpoint on a loopback port. Routes are keyed by
 * method and path; unknown paths answer 404 with a Status body.
 */

import * as http from 'node:http';

export interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  authorization?: string;
}

type Route = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export class FakeApiServer {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Route>();
  private readonly server = http.createServer((req, res) => this.handle(req, res));

  async start(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  json(method: string, path: string, body: unknown, status = 200): void {
    this.routes.set(`${method} ${path}`, (_req, res) => {
      res.writeHead(status, { 'content-type': 'application/json' });
      res.end(JSON.stringify(body));
    });
  }

  text(method: string, path: string, body: string): void {
    this.routes.set(`${method} ${path}`, (_req, res) => {
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end(body);
    });
  }

  /** Accept the request and never answer it */
  hang(method: string, path: string, onRequest: (req: http.IncomingMessage) => void): void {
    this.routes.set(`${method} ${path}`, (req) => onRequest(req));
  }

  paths(): string[] {
    return this.requests.map((request) => request.path);
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname.replace(/\/$/, '') || '/';
    const method = req.method ?? 'GET';
    this.requests.push({ method, path, query: url.searchParams, authorization: req.headers.authorization });

    const route = this.routes.get(`${method} ${path}`);
    if (route) {
      route(req, res);
      return;
    }
    res.writeHead(404, { 'content-type': 'application/json' });
    res.end(JSON.stringify({ kind: 'Status', status: 'Failure', message: `${path} not found`, code: 404 }));
  }
}
