import { createServer, type IncomingMessage } from 'node:http';

export interface JsonRpcRequest {
  id: number;
  method: string;
  params: unknown[];
}

/**
 * Raw HTTP reply; body is sent as-is so broken payloads can be served
 */
export interface RpcReply {
  status?: number;
  contentType?: string;
  body: string;
}

export type RpcHandler = (request: JsonRpcRequest) => RpcReply;

export interface LocalRpcServer {
  url: string;
  requests: JsonRpcRequest[];
  close(): Promise<void>;
}

/**
 * JSON-RPC over HTTP on 127.0.0.1 with an ephemeral port
 */
export async function startRpcServer(handler: RpcHandler): Promise<LocalRpcServer> {
  const requests: JsonRpcRequest[] = [];

  const server = createServer((req, res) => {
    readBody(req)
      .then((raw) => {
        const request = parseRequest(raw);
        requests.push(request);
        const reply = handler(request);
        res.writeHead(reply.status ?? 200, { 'content-type': reply.contentType ?? 'application/json' });
        res.end(reply.body);
      })
      .catch((err: unknown) => {
        res.writeHead(500, { 'content-type': 'text/plain' });
        res.end(String(err));
      });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('RPC test server has no TCP address');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        // fetch keeps connections alive; drop them so close() does not wait
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * URL of a port that was just released, so connections to it are refused
 */
export async function refusedUrl(): Promise<string> {
  const server = await startRpcServer(() => ({ body: '' }));
  await server.close();
  return server.url;
}

export function rpcResult(id: number, result: unknown): RpcReply {
  return { body: JSON.stringify({ jsonrpc: '2.0', id, result }) };
}

export function rpcError(id: number, code: number, message: string): RpcReply {
  return { body: JSON.stringify({ jsonrpc: '2.0', id, error: { code, message } }) };
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let raw = '';
    req.setEncoding('utf8');
    req.on('data', (chunk: string) => {
      raw += chunk;
    });
    req.on('end', () => resolve(raw));
    req.on('error', reject);
  });
}

function parseRequest(raw: string): JsonRpcRequest {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Expected a single JSON-RPC request');
  }
  return {
    id: 'id' in parsed && typeof parsed.id === 'number' ? parsed.id : 0,
    method: 'method' in parsed && typeof parsed.method === 'string' ? parsed.method : '',
    params: 'params' in parsed && Array.isArray(parsed.params) ? parsed.params : [],
  };
}
