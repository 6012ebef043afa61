/**
 * Node.js entrypoint.
 *
 * Run with: npx tsx example/node.ts
 *
 * Builds the normalized request straight from Node's IncomingMessage, so
 * GET requests with a body (like /upsidedown) work, which fetch forbids.
 */

import { createServer } from 'node:http';
import { createRequest } from '../src/index.js';
import { dispatcher } from './server.js';

const server = createServer(async (req, res) => {
  const headers: [string, string][] = [];
  for (let i = 0; i + 1 < req.rawHeaders.length; i += 2) {
    headers.push([req.rawHeaders[i], req.rawHeaders[i + 1]]);
  }

  const request = createRequest({
    method: req.method ?? 'GET',
    path: req.url ?? '/',
    headers,
    body: req,
    client: req.socket.remoteAddress
      ? { ip: req.socket.remoteAddress, port: req.socket.remotePort }
      : undefined,
  });

  const response = await dispatcher.handle(request);
  res.statusCode = response.status;
  for (const [name, value] of response.headers) {
    res.appendHeader(name, value);
  }
  for (const chunk of response.body) {
    res.write(chunk);
  }
  res.end();
});

const PORT = process.env.PORT ?? 3000;
server.listen(PORT, () => {
  console.log(`Server running at http://localhost:${PORT}`);
});
