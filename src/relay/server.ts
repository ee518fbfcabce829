import type { Server } from 'http';

import cors from 'cors';
import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
  json,
} from 'express';
import { v7 as uuidv7 } from 'uuid';

import type { ServiceConfig } from '../config.js';
import { Logger } from '../utils/logger.js';

import { RelayError } from './errors.js';
import { CallbackEndpointHandler } from './handlers/callbackHandler.js';
import { ResultAccessor } from './handlers/resultAccessor.js';
import { createA2AClientFactory } from './remote/a2aClient.js';
import type { RemoteTaskClientFactory } from './remote/types.js';
import { InMemorySessionStore } from './sessions/memoryStore.js';
import type { SessionStore } from './sessions/types.js';
import { TaskLifecycleReconciler } from './tasks/reconciler.js';
import { TaskStore } from './tasks/store.js';
import { parseCreateTaskRequest } from './validation.js';

export const SESSION_HEADER = 'x-session-id';
export const NOTIFICATION_TOKEN_HEADER = 'x-a2a-notification-token';
export const PUSH_CALLBACK_PATH = '/push-callback';

interface ServerConfig {
  serviceConfig: ServiceConfig;
  /** Defaults to an in-memory store owned (and cleaned up) by the server */
  sessionStore?: SessionStore;
  /** Defaults to A2A clients for `serviceConfig.remote` */
  clientFactory?: RemoteTaskClientFactory;
  onRequestLog?: (entry: RequestLogEntry) => void;
}

/**
 * Log entry for a request
 */
export interface RequestLogEntry {
  method: string;
  path: string;
  timestamp: Date;
}

interface MiddlewareConfig {
  logRequests?: boolean;
  onRequestLog?: (entry: RequestLogEntry) => void;
}

export interface RelayDependencies {
  reconciler: TaskLifecycleReconciler;
  callbackHandler: CallbackEndpointHandler;
  resultAccessor: ResultAccessor;
  publicUrl?: string;
}

const ownedSessionStores = new WeakMap<Server, InMemorySessionStore>();

/**
 * Creates the relay HTTP server and resolves once it is listening
 */
export async function createRelayServer(config: ServerConfig): Promise<Server> {
  const { serviceConfig } = config;
  const { port, host, publicUrl } = serviceConfig.server;
  const loggingConfig = serviceConfig.logging;

  Logger.configure({ level: loggingConfig.level, structured: loggingConfig.structured });
  const logger = Logger.getInstance('RelayServer');

  logger.info('=== Server Configuration ===');
  logger.info(`Server: ${Logger.colorValue(`${host}:${port}`)}`);
  logger.info(`Remote endpoint: ${Logger.colorValue(serviceConfig.remote.endpoint)}`);
  logger.info(`Callback base: ${Logger.colorValue(publicUrl ?? '<from request>')}`);
  logger.info(`Logging: ${Logger.colorValue(loggingConfig.enabled ? 'enabled' : 'disabled')}`);
  logger.info(`Log Level: ${Logger.colorValue(loggingConfig.level)}`);
  if (!publicUrl) {
    logger.warn(
      'PUBLIC_URL is not set; push callback URLs are derived from request Host headers',
    );
  }

  let ownedStore: InMemorySessionStore | undefined;
  let sessionStore = config.sessionStore;
  if (!sessionStore) {
    ownedStore = new InMemorySessionStore({
      idleTimeoutMinutes: serviceConfig.session.idleTimeoutMinutes,
    });
    ownedStore.startCleanup();
    sessionStore = ownedStore;
  }

  const clientFactory = config.clientFactory ?? createA2AClientFactory(serviceConfig.remote);
  const taskStore = new TaskStore(sessionStore);
  const reconciler = new TaskLifecycleReconciler(taskStore, clientFactory);

  const app = express();
  app.set('trust proxy', true);

  setupMiddleware(app, {
    logRequests: loggingConfig.enabled,
    onRequestLog: config.onRequestLog,
  });

  registerRelayRoutes(app, {
    reconciler,
    callbackHandler: new CallbackEndpointHandler(reconciler),
    resultAccessor: new ResultAccessor(taskStore),
    publicUrl,
  });

  app.use(relayErrorHandler);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(port, host);
    listening.once('listening', () => resolve(listening));
    listening.once('error', (error) => {
      ownedStore?.stopCleanup();
      reject(error);
    });
  });

  if (ownedStore) {
    ownedSessionStores.set(server, ownedStore);
  }

  const address = server.address();
  if (address && typeof address !== 'string') {
    const url = `http://${address.address}:${address.port}`;
    logger.info(`Relay listening on ${Logger.colorValue(url)}`);
  }
  return server;
}

/**
 * Sets up Express middleware for the relay
 */
export function setupMiddleware(app: Express, config: MiddlewareConfig = {}): void {
  // JSON body parser - MUST come before any middleware that reads req.body
  app.use(json());

  app.use(
    cors({
      origin: true,
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Session-Id'],
      exposedHeaders: ['X-Session-Id'],
    }),
  );

  if (config.logRequests) {
    const logger = Logger.getInstance('RelayServer');
    app.use((req: Request, _res: Response, next: NextFunction) => {
      const entry: RequestLogEntry = {
        method: req.method,
        path: req.path,
        timestamp: new Date(),
      };
      logger.info('HTTP request', { method: req.method, path: req.path });
      config.onRequestLog?.(entry);
      next();
    });
  }
}

/**
 * Registers the task, result and push-callback routes plus /health
 */
export function registerRelayRoutes(app: Express, deps: RelayDependencies): void {
  const { reconciler, callbackHandler, resultAccessor, publicUrl } = deps;

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).send('ok');
  });

  app.post(
    '/task',
    asyncRoute(async (req, res) => {
      const sessionId = resolveSessionId(req, res);
      const body = parseCreateTaskRequest(req.body);
      const base = publicUrl ? trimTrailingSlash(publicUrl) : resolveOrigin(req);
      const callbackUrl = `${base}${PUSH_CALLBACK_PATH}`;
      const taskId = await reconciler.createTask({
        sessionId,
        agentId: body.agentId,
        message: body.message,
        callbackUrl,
      });
      res.json({ task: taskId });
    }),
  );

  app.get(
    '/task-result',
    asyncRoute(async (req, res) => {
      const sessionId = resolveSessionId(req, res);
      const record = await resultAccessor.fetchAndClear(sessionId, req.query['taskId']);
      res.json({ agentId: record.agentId, isFinal: record.isFinal, message: record.message });
    }),
  );

  app.get(PUSH_CALLBACK_PATH, (req: Request, res: Response, next: NextFunction) => {
    try {
      const token = callbackHandler.verify(req.query['validationToken']);
      res.status(200).type('text/plain').send(token);
    } catch (error: unknown) {
      next(error);
    }
  });

  app.post(
    PUSH_CALLBACK_PATH,
    asyncRoute(async (req, res) => {
      const sessionId = req.get(NOTIFICATION_TOKEN_HEADER) ?? req.get(SESSION_HEADER);
      await callbackHandler.onEvent(sessionId, req.body);
      res.status(200).end();
    }),
  );
}

/**
 * Maps relay errors to their status with a plain-text message
 */
export function relayErrorHandler(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (res.headersSent) {
    next(error);
    return;
  }
  const logger = Logger.getInstance('RelayServer');

  if (error instanceof RelayError) {
    logger.debug('Request rejected', {
      path: req.path,
      status: error.statusCode,
      error: error.message,
    });
    res.status(error.statusCode).type('text/plain').send(error.message);
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).type('text/plain').send('Invalid JSON body');
    return;
  }

  logger.error('Unhandled error in request', error, { method: req.method, path: req.path });
  res.status(500).type('text/plain').send('Internal server error');
}

/**
 * Shuts down the server gracefully
 */
export async function shutdownServer(server: Server): Promise<void> {
  ownedSessionStores.get(server)?.stopCleanup();
  ownedSessionStores.delete(server);

  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    void handler(req, res).catch(next);
  };
}

/**
 * Reads the caller's session token, issuing a new one when the request has none
 */
function resolveSessionId(req: Request, res: Response): string {
  const existing = req.get(SESSION_HEADER);
  if (existing) {
    return existing;
  }
  const sessionId = uuidv7();
  res.setHeader('X-Session-Id', sessionId);
  return sessionId;
}

function resolveOrigin(req: Request): string {
  // Reverse proxy headers first
  const forwardedProto = req.get('x-forwarded-proto');
  const forwardedHost = req.get('x-forwarded-host') ?? req.get('host');
  const protocol = forwardedProto ?? req.protocol;
  return trimTrailingSlash(`${protocol}://${forwardedHost ?? 'localhost'}`);
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

function isBodyParseError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}
