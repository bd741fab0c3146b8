import { createServer, type IncomingHttpHeaders, type Server } from 'node:http';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
}

export interface Reply {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
  /** Hold the response back this long */
  delayMs?: number;
}

export interface TestServer {
  url: string;
  port: number;
  requests: RecordedRequest[];
  /** Replace the handler for subsequent requests */
  respond(handler: (request: RecordedRequest) => Reply): void;
  close(): Promise<void>;
}

/**
 * HTTP server on a random loopback port that records requests and answers through a
 * replaceable handler (200 with an empty body by default).
 */
export async function startTestServer(
  handler: (request: RecordedRequest) => Reply = () => ({}),
): Promise<TestServer> {
  let current = handler;
  const requests: RecordedRequest[] = [];

  const server: Server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const recorded: RecordedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      requests.push(recorded);
      const reply = current(recorded);
      const send = (): void => {
        if (res.destroyed) {
          return;
        }
        res.writeHead(reply.status ?? 200, reply.headers ?? {});
        res.end(reply.body ?? '');
      };
      if (reply.delayMs) {
        setTimeout(send, reply.delayMs).unref();
      } else {
        send();
      }
    });
  });

  const port = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address ? address.port : 0);
    });
  });

  return {
    url: `http://127.0.0.1:${port}`,
    port,
    requests,
    respond: (next) => {
      current = next;
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
