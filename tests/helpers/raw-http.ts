import * as net from 'net';

/**
 * Send a hand-written HTTP request (headers fetch would refuse to send)
 * and collect whatever the server writes back before closing.
 * Resolves with the data received so far if nothing arrives within `timeoutMs`.
 */
export function sendRawRequest(port: number, request: string, timeoutMs: number = 2000): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    const socket = net.connect(port, '127.0.0.1', () => {
      socket.write(request);
    });

    socket.setEncoding('utf-8');
    socket.setTimeout(timeoutMs, () => {
      socket.destroy();
      resolve(data);
    });
    socket.on('data', (chunk: string) => {
      data += chunk;
    });
    socket.on('end', () => resolve(data));
    socket.on('error', reject);
  });
}

/**
 * Status line of a raw HTTP response, e.g. "HTTP/1.1 400 Bad Request"
 */
export function statusLine(response: string): string {
  return response.split('\r\n')[0];
}
