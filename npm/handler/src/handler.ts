/**
 * Request handler: resolve options, execute, render.
 */

import { isSchema } from 'graphql';
import { createBaseContext } from './context';
import { ConfigurationError, toError } from './errors';
import { executeRequest } from './execute';
import { createLogger } from './logger';
import { DEFAULT_PLAYGROUND_TITLE } from './playground';
import { renderJson, renderPlayground, shouldRenderPlayground } from './render';
import {
  DEFAULT_MAX_UPLOAD_MEMORY_SIZE,
  releaseRequestOptions,
  resolveRequestOptions,
} from './request-options';
import type {
  BaseContext,
  ContextFactory,
  HandlerConfig,
  RequestOptions,
  ResolvedHandlerConfig,
} from './types';

const isDevelopment = process.env.NODE_ENV !== 'production';

const DEFAULT_OPTIONS = {
  title: DEFAULT_PLAYGROUND_TITLE,
  pretty: true,
  playground: isDevelopment,
  maxUploadMemorySize: DEFAULT_MAX_UPLOAD_MEMORY_SIZE,
} as const;

/**
 * GraphQL HTTP handler.
 */
export interface GraphQLHandler<TContext = BaseContext> {
  /**
   * Handles a request with a context built by the configured factory.
   */
  fetch(request: Request): Promise<Response>;

  /**
   * Handles a request with a caller-supplied context.
   */
  handle(context: TContext, request: Request): Promise<Response>;

  readonly config: ResolvedHandlerConfig<TContext>;
}

/**
 * Applies defaults and checks the configuration.
 */
export function resolveHandlerConfig<TContext>(
  config: HandlerConfig<TContext>
): ResolvedHandlerConfig<TContext> {
  if (!isSchema(config.schema)) {
    throw new ConfigurationError('Undefined GraphQL schema');
  }

  return Object.freeze({
    ...config,
    title: config.title || DEFAULT_OPTIONS.title,
    pretty: config.pretty ?? DEFAULT_OPTIONS.pretty,
    playground: config.playground ?? DEFAULT_OPTIONS.playground,
    maxUploadMemorySize: config.maxUploadMemorySize ?? DEFAULT_OPTIONS.maxUploadMemorySize,
    logger: config.logger ?? createLogger(),
  });
}

/**
 * Creates a GraphQL handler for a prebuilt schema. Resolvers receive a
 * `BaseContext` unless a `context` factory is configured.
 *
 * @example
 * ```typescript
 * const handler = createHandler({
 *   schema,
 *   pretty: false,
 *   rootValue: (_ctx, _req, options) => ({ files: options.uploadedFiles }),
 * });
 *
 * const response = await handler.fetch(
 *   new Request('http://localhost/graphql?query={hello}')
 * );
 * ```
 */
export function createHandler(config: HandlerConfig<BaseContext>): GraphQLHandler<BaseContext> {
  return createHandlerWithContext({
    ...config,
    context: config.context ?? createBaseContext,
  });
}

/**
 * Creates a GraphQL handler whose context comes from `config.context`.
 */
export function createHandlerWithContext<TContext>(
  config: HandlerConfig<TContext> & { readonly context: ContextFactory<TContext> }
): GraphQLHandler<TContext> {
  const resolved = resolveHandlerConfig(config);
  const createContext = config.context;
  const { logger } = resolved;

  const respond = async (
    context: TContext,
    request: Request,
    options: RequestOptions
  ): Promise<Response> => {
    const { params, result } = await executeRequest({
      schema: resolved.schema,
      options,
      context,
      request,
      rootValue: resolved.rootValue,
      formatError: resolved.formatError,
    });

    if (result.errors) {
      logger.debug('GraphQL request completed with errors', {
        operationName: options.operationName || undefined,
        errors: result.errors.length,
      });
    }

    const headers = new Headers();
    if (resolved.onBeforeResponse) {
      await resolved.onBeforeResponse(context, params, result, headers);
    }

    if (shouldRenderPlayground(request, resolved.playground)) {
      return renderPlayground(resolved.title, headers);
    }

    const { response, body } = renderJson(result, resolved.pretty, headers);
    if (resolved.onResult) {
      await resolved.onResult(context, params, result, body);
    }
    return response;
  };

  const handle = async (context: TContext, request: Request): Promise<Response> => {
    const options = await resolveRequestOptions(request, {
      maxUploadMemorySize: resolved.maxUploadMemorySize,
      logger,
    });

    try {
      return await respond(context, request, options);
    } finally {
      await releaseRequestOptions(options).catch((error: unknown) => {
        logger.warn('Could not remove uploaded files', { error: toError(error).message });
      });
    }
  };

  return {
    config: resolved,

    async fetch(request) {
      return handle(await createContext(request), request);
    },

    handle,
  };
}
