import * as http from 'http';
import * as path from 'path';
import * as fs from 'fs/promises';
import { NodeRegistry } from './node-registry';
import { NodePoller } from './node-poller';
import { RequestLogger, RequestTimer } from './request-logger';
import { fileExists } from '../utils/file-utils';
import { boundPort, close, listen, requestPath, sendError, sendJson } from '../utils/http-utils';

export interface AggregatorServerOptions {
  port: number;
  host: string;
  verbose?: boolean;
  logFilePath?: string;
  webRoot?: string;       // Directory holding index.html
}

const NODE_PATH = /^\/api\/nodes\/([^/]+)$/;

// Resolves to <project>/web from both src/lib and dist/lib
const DEFAULT_WEB_ROOT = path.resolve(__dirname, '../..', 'web');

/**
 * Aggregator HTTP server - read-only view of the node registry
 */
export class AggregatorServer {
  private readonly registry: NodeRegistry;
  private readonly poller?: NodePoller;
  private readonly options: AggregatorServerOptions;
  private readonly server: http.Server;
  private readonly logger: RequestLogger;
  private readonly webRoot: string;

  constructor(registry: NodeRegistry, options: AggregatorServerOptions, poller?: NodePoller) {
    this.registry = registry;
    this.poller = poller;
    this.options = options;
    this.webRoot = options.webRoot ?? DEFAULT_WEB_ROOT;
    this.logger = new RequestLogger({
      component: 'Aggregator',
      verbose: options.verbose,
      logFilePath: options.logFilePath,
    });

    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        console.error('[Aggregator] Error handling request:', error);
      });
    });
  }

  async start(): Promise<void> {
    await listen(this.server, this.options.port, this.options.host);
    console.error(`[Aggregator] Listening on http://${this.options.host}:${this.port}`);
    console.error(`[Aggregator] Monitoring ${this.registry.size} node(s)`);
  }

  async stop(): Promise<void> {
    await close(this.server);
  }

  get port(): number {
    return boundPort(this.server, this.options.port);
  }

  /**
   * Main request handler
   */
  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    // Handle OPTIONS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(200);
      res.end();
      return;
    }

    const timer = new RequestTimer();
    const method = req.method ?? 'GET';
    let pathname = req.url ?? '/';

    try {
      const parsedPath = requestPath(req);
      if (parsedPath === null) {
        sendError(res, 400, 'Bad Request', `Invalid request URL: ${pathname}`, 'INVALID_URL');
      } else {
        pathname = parsedPath;
        await this.route(method, pathname, res);
      }
    } catch (error) {
      console.error('[Aggregator] Error handling request:', error);
      sendError(res, 500, 'Internal Server Error', (error as Error).message, 'INTERNAL_ERROR');
    }

    await this.logger.logRequest({
      timestamp: RequestTimer.now(),
      method,
      path: pathname,
      statusCode: res.statusCode,
      durationMs: timer.elapsed(),
    });
  }

  /**
   * Dispatch a parsed request
   */
  private async route(method: string, pathname: string, res: http.ServerResponse): Promise<void> {
    if (method !== 'GET') {
      sendError(res, 405, 'Method Not Allowed', `Unsupported method: ${method}`, 'METHOD_NOT_ALLOWED');
    } else if (pathname === '/health') {
      this.handleHealth(res);
    } else if (pathname === '/api/nodes') {
      sendJson(res, 200, this.registry.getAll());
    } else if (NODE_PATH.test(pathname)) {
      this.handleGetNode(res, pathname);
    } else if (pathname.startsWith('/api/')) {
      sendError(res, 404, 'Not Found', `Unknown endpoint: ${method} ${pathname}`, 'NOT_FOUND');
    } else {
      await this.handleStaticFile(res, pathname);
    }
  }

  /**
   * Health check endpoint
   */
  private handleHealth(res: http.ServerResponse): void {
    sendJson(res, 200, {
      status: 'healthy',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      nodes: this.registry.size,
      polling: this.poller?.isRunning() ?? false,
      last_tick: this.poller?.lastTick ?? null,
    });
  }

  /**
   * GET /api/nodes/{name}
   */
  private handleGetNode(res: http.ServerResponse, pathname: string): void {
    const match = pathname.match(NODE_PATH);
    let name: string;
    try {
      name = decodeURIComponent(match ? match[1] : '');
    } catch {
      sendError(res, 400, 'Bad Request', `Invalid node name: ${pathname}`, 'INVALID_NAME');
      return;
    }

    const node = this.registry.get(name);
    if (!node) {
      sendError(res, 404, 'Not Found', `Node not found: ${name}`, 'NODE_NOT_FOUND');
      return;
    }

    sendJson(res, 200, node);
  }

  /**
   * Serve the dashboard page
   */
  private async handleStaticFile(res: http.ServerResponse, pathname: string): Promise<void> {
    if (pathname !== '/' && pathname !== '/index.html') {
      sendError(res, 404, 'Not Found', `Unknown path: ${pathname}`, 'NOT_FOUND');
      return;
    }

    const indexPath = path.join(this.webRoot, 'index.html');
    if (!(await fileExists(indexPath))) {
      sendError(res, 404, 'Not Found', 'Dashboard page not found', 'STATIC_NOT_FOUND');
      return;
    }

    const content = await fs.readFile(indexPath);
    res.writeHead(200, {
      'Content-Type': 'text/html; charset=utf-8',
      'Content-Length': content.length,
      'Cache-Control': 'no-cache',
    });
    res.end(content);
  }
}
