import * as http from 'http';

export interface ErrorResponse {
  error: string;
  details?: string;
  code?: string;
}

/**
 * Send JSON response
 */
export function sendJson(res: http.ServerResponse, statusCode: number, data: unknown): void {
  if (res.headersSent) return;

  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data, null, 2));
}

/**
 * Send JSON error response
 */
export function sendError(
  res: http.ServerResponse,
  statusCode: number,
  error: string,
  details?: string,
  code?: string
): void {
  const response: ErrorResponse = { error };
  if (details) response.details = details;
  if (code) response.code = code;

  sendJson(res, statusCode, response);
}

/**
 * Send plain-text response
 */
export function sendText(res: http.ServerResponse, statusCode: number, body: string): void {
  if (res.headersSent) return;

  res.writeHead(statusCode, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(body);
}

/**
 * Parse the request URL (req.url is path-only)
 */
export function requestUrl(req: http.IncomingMessage): URL {
  return new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
}

/**
 * Path of the request, or null when the URL cannot be parsed (e.g. a malformed Host header)
 */
export function requestPath(req: http.IncomingMessage): string | null {
  try {
    return requestUrl(req).pathname;
  } catch {
    return null;
  }
}

/**
 * Start listening; rejects on bind errors such as EADDRINUSE
 */
export function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

/**
 * Stop accepting connections and wait for in-flight requests to finish
 */
export function close(server: http.Server): Promise<void> {
  if (!server.listening) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

/**
 * Port the server is actually bound to (differs from the requested one for port 0)
 */
export function boundPort(server: http.Server, fallback: number): number {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : fallback;
}
