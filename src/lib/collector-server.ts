import * as http from 'http';
import { GpuCollector } from './gpu-collector';
import { RequestLogger, RequestTimer } from './request-logger';
import { boundPort, close, listen, requestPath, sendJson, sendText } from '../utils/http-utils';

export interface CollectorServerOptions {
  port: number;
  host: string;
  verbose?: boolean;
  logFilePath?: string;
}

const ROUTES = new Set(['/gpu-info', '/health']);

/**
 * Collector HTTP server - serves this host's GPU telemetry to the aggregator
 */
export class CollectorServer {
  private readonly collector: GpuCollector;
  private readonly options: CollectorServerOptions;
  private readonly server: http.Server;
  private readonly logger: RequestLogger;

  constructor(collector: GpuCollector, options: CollectorServerOptions) {
    this.collector = collector;
    this.options = options;
    this.logger = new RequestLogger({
      component: 'Collector',
      verbose: options.verbose,
      logFilePath: options.logFilePath,
    });

    this.server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error) => {
        console.error('[Collector] Error handling request:', error);
      });
    });
  }

  async start(): Promise<void> {
    await listen(this.server, this.options.port, this.options.host);
    console.error(`[Collector] Listening on http://${this.options.host}:${this.port}`);
    console.error(`[Collector] PID: ${process.pid}`);
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
    const timer = new RequestTimer();
    const method = req.method ?? 'GET';
    let pathname = req.url ?? '/';
    let failure: string | undefined;

    try {
      const parsedPath = requestPath(req);
      if (parsedPath === null) {
        failure = `Invalid request URL: ${pathname}`;
        sendText(res, 400, 'Bad Request');
      } else {
        pathname = parsedPath;
        failure = await this.route(method, pathname, res);
      }
    } catch (error) {
      failure = (error as Error).message;
      console.error('[Collector] Error handling request:', error);
      sendText(res, 500, 'Internal Server Error');
    }

    await this.logger.logRequest({
      timestamp: RequestTimer.now(),
      method,
      path: pathname,
      statusCode: res.statusCode,
      durationMs: timer.elapsed(),
      error: failure,
    });
  }

  /**
   * Dispatch a parsed request - returns the failure message, if any
   */
  private async route(method: string, pathname: string, res: http.ServerResponse): Promise<string | undefined> {
    if (!ROUTES.has(pathname)) {
      sendText(res, 404, 'Not Found');
      return undefined;
    }
    if (method !== 'GET') {
      sendText(res, 405, 'Method Not Allowed');
      return undefined;
    }
    if (pathname === '/health') {
      sendText(res, 200, 'OK');
      return undefined;
    }
    return this.handleGpuInfo(res);
  }

  /**
   * GET /gpu-info - returns the failure message, if any
   */
  private async handleGpuInfo(res: http.ServerResponse): Promise<string | undefined> {
    try {
      const telemetry = await this.collector.collectTelemetry();
      sendJson(res, 200, telemetry);
      return undefined;
    } catch (error) {
      const message = `Failed to get GPU info: ${(error as Error).message}`;
      sendText(res, 500, message);
      return message;
    }
  }
}
