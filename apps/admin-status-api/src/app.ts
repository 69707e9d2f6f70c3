import type {Server} from 'node:http';

import 'reflect-metadata';
import helmet from 'helmet';
import express from 'express';
import swaggerUi from 'swagger-ui-express';
import {NestFactory} from '@nestjs/core';
import {ExpressAdapter} from '@nestjs/platform-express';
import {createStructuredLogger, type StructuredLogger} from '@credential-agent/logging';

import {createAuthGateFromConfig, type AdminAuthGate} from './auth';
import {InMemoryTimingCollector, type TimingCollector} from './collector';
import type {ServiceConfig} from './config';
import {AdminSetupError} from './errors';
import {AdminStatusNestModule} from './nest/adminStatusNestModule';
import {buildOpenApiDocument} from './openapi';
import {createDefaultInterceptors, type AdminRequestInterceptor} from './pipeline/interceptors';
import {createAdminRequestPipeline} from './pipeline/requestPipeline';
import type {AdminProfile} from './profile';
import {DOCUMENTATION_PATHS} from './routes';
import type {AdminStatusRuntime} from './runtime';
import {ServerState} from './state';

export const serviceName = 'admin-status-api';

const component = 'admin.server';

export type CreateAdminStatusServerOptions = {
  config: ServiceConfig;
  rootProfile: AdminProfile;
  collector?: TimingCollector;
  authGate?: AdminAuthGate;
  interceptors?: readonly AdminRequestInterceptor[];
  logger?: StructuredLogger;
  now?: () => Date;
};

export type StartOptions = {
  host?: string;
  port?: number;
};

export const createAdminStatusServer = async ({
  config,
  rootProfile,
  collector: providedCollector,
  authGate: providedAuthGate,
  interceptors: providedInterceptors,
  logger: providedLogger,
  now = () => new Date()
}: CreateAdminStatusServerOptions) => {
  const logger =
    providedLogger ??
    createStructuredLogger({
      service: serviceName,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    });
  const collector = providedCollector ?? (config.timing.enabled ? new InMemoryTimingCollector() : undefined);
  const authGate = providedAuthGate ?? createAuthGateFromConfig(config.auth);
  const state = new ServerState();
  const openApiDocument = buildOpenApiDocument({
    title: config.documentation.agentLabel,
    version: config.documentation.version
  });

  const runtime: AdminStatusRuntime = {
    state,
    collector,
    logger,
    openApiDocument,
    now
  };

  const expressApp = express();
  expressApp.disable('x-powered-by');
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  );

  const nestApp = await NestFactory.create(AdminStatusNestModule.register(runtime), new ExpressAdapter(expressApp), {
    bodyParser: false,
    logger: config.nodeEnv === 'test' ? false : ['error', 'warn']
  });

  nestApp.enableCors({
    origin: true,
    credentials: true,
    methods: ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
    exposedHeaders: '*'
  });

  expressApp.use(
    createAdminRequestPipeline({
      interceptors:
        providedInterceptors ??
        createDefaultInterceptors({
          state,
          authGate,
          profile: rootProfile,
          maxRequestBytes: config.maxRequestBytes
        }),
      logger,
      now
    })
  );
  expressApp.use(
    DOCUMENTATION_PATHS.ui,
    swaggerUi.serve,
    swaggerUi.setup(openApiDocument, {
      customSiteTitle: config.documentation.agentLabel
    })
  );

  await nestApp.init();

  const server = nestApp.getHttpServer() as Server;

  let startPromise: Promise<void> | undefined;
  let stopPromise: Promise<void> | undefined;

  const address = () => {
    const value = server.address();
    if (!value || typeof value === 'string') {
      return undefined;
    }

    return {host: value.address, port: value.port};
  };

  const listen = async ({host, port}: {host: string; port: number}) => {
    try {
      await nestApp.listen(port, host);
    } catch (error) {
      throw new AdminSetupError({
        host,
        port,
        reason: error instanceof Error ? error.message : undefined,
        cause: error
      });
    }
  };

  const start = async ({host = config.host, port = config.port}: StartOptions = {}) => {
    if (stopPromise) {
      throw new AdminSetupError({host, port, reason: 'server has been stopped'});
    }
    if (startPromise) {
      throw new AdminSetupError({host, port, reason: 'server is already started'});
    }

    const listening = listen({host, port});
    // stop() waits on this; a failed bind clears it so start() may be retried.
    startPromise = listening.catch(() => {
      startPromise = undefined;
    });
    await listening;

    if (stopPromise) {
      throw new AdminSetupError({host, port, reason: 'server was stopped while starting'});
    }

    state.setAlive(true);
    state.setReady(true);
    logger.info({
      event: 'admin.server.started',
      component,
      message: 'Admin status server started',
      metadata: {
        host,
        port: address()?.port ?? port,
        auth_mode: authGate.mode,
        timing_enabled: collector !== undefined
      }
    });
  };

  const stop = () => {
    stopPromise ??= (async () => {
      state.setReady(false);
      await startPromise;
      await nestApp.close();
      state.setAlive(false);
      logger.info({
        event: 'admin.server.stopped',
        component,
        message: 'Admin status server stopped',
        metadata: state.snapshot()
      });
    })();

    return stopPromise;
  };

  const notifyFatalError = () => {
    state.setAlive(false);
    state.setReady(false);
    logger.error({
      event: 'admin.server.fatal_error_notified',
      component,
      message: 'Fatal error reported, admin status server is no longer alive',
      reason_code: 'fatal_error',
      metadata: state.snapshot()
    });
  };

  const markNotReady = () => {
    state.setReady(false);
  };

  return {
    server,
    state,
    collector,
    openApiDocument,
    address,
    start,
    stop,
    notifyFatalError,
    markNotReady
  };
};

export type AdminStatusServer = Awaited<ReturnType<typeof createAdminStatusServer>>;
