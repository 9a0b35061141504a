/**
 * Core types for the gqlserve handler.
 */

import type {
  ExecutionResult,
  FormattedExecutionResult,
  GraphQLArgs,
  GraphQLFormattedError,
  GraphQLSchema,
} from 'graphql';
import type { File } from 'node:buffer';
import type { Logger } from './logger';

/**
 * A file part of a multipart request.
 */
export type UploadedFile = File;

/**
 * GraphQL request options resolved from an HTTP request.
 */
export interface RequestOptions {
  readonly query: string;
  readonly variables: Readonly<Record<string, unknown>>;
  readonly operationName: string;
  readonly uploadedFiles: Readonly<Record<string, ReadonlyArray<UploadedFile>>>;
}

/**
 * Arguments handed to graphql-js for one request.
 */
export type ExecutionParams = GraphQLArgs;

/**
 * Result written to the response. Errors are already formatted when a
 * `formatError` hook is configured.
 */
export type HandlerResult = ExecutionResult | FormattedExecutionResult;

/**
 * Request information.
 */
export interface RequestInfo {
  readonly headers: Headers;
  readonly cookies: ReadonlyMap<string, string>;
  readonly ip: string;
  readonly method: string;
  readonly url: string;
}

/**
 * Context used when no factory is configured.
 */
export interface BaseContext {
  readonly request: RequestInfo;

  /**
   * Abort signal of the underlying request.
   */
  readonly signal: AbortSignal;
}

/**
 * Context factory function.
 */
export type ContextFactory<TContext> = (
  request: Request
) => Promise<TContext> | TContext;

/**
 * Builds the root value handed to the top-level resolvers.
 */
export type RootValueFn<TContext> = (
  context: TContext,
  request: Request,
  options: RequestOptions
) => unknown;

/**
 * Called after execution, before the response is rendered. Headers set on
 * `headers` are added to the response.
 */
export type BeforeResponseFn<TContext> = (
  context: TContext,
  params: ExecutionParams,
  result: HandlerResult,
  headers: Headers
) => void | Promise<void>;

/**
 * Called after a JSON response is produced, with the exact body bytes.
 */
export type ResultCallbackFn<TContext> = (
  context: TContext,
  params: ExecutionParams,
  result: HandlerResult,
  body: Uint8Array
) => void | Promise<void>;

/**
 * Rewrites an execution error. Receives the error thrown by a resolver when
 * there is one, otherwise the GraphQL error itself.
 */
export type FormatErrorFn = (error: Error) => GraphQLFormattedError;

/**
 * Handler configuration.
 */
export interface HandlerConfig<TContext = BaseContext> {
  /**
   * Executable schema.
   */
  readonly schema: GraphQLSchema;

  /**
   * Console page title.
   * @default 'GraphQL Playground'
   */
  readonly title?: string;

  /**
   * Indent JSON responses.
   * @default true
   */
  readonly pretty?: boolean;

  /**
   * Serve the GraphiQL console to browser navigations.
   * @default true outside production
   */
  readonly playground?: boolean;

  /**
   * Bytes of multipart file data kept in memory per request. Larger
   * uploads are written to temporary files for the duration of the request.
   * @default 10485760
   */
  readonly maxUploadMemorySize?: number;

  readonly context?: ContextFactory<TContext>;
  readonly rootValue?: RootValueFn<TContext>;
  readonly onBeforeResponse?: BeforeResponseFn<TContext>;
  readonly onResult?: ResultCallbackFn<TContext>;
  readonly formatError?: FormatErrorFn;

  readonly logger?: Logger;
}

/**
 * Handler configuration with defaults applied.
 */
export interface ResolvedHandlerConfig<TContext>
  extends Omit<
    Required<HandlerConfig<TContext>>,
    'context' | 'rootValue' | 'onBeforeResponse' | 'onResult' | 'formatError'
  > {
  readonly context?: ContextFactory<TContext>;
  readonly rootValue?: RootValueFn<TContext>;
  readonly onBeforeResponse?: BeforeResponseFn<TContext>;
  readonly onResult?: ResultCallbackFn<TContext>;
  readonly formatError?: FormatErrorFn;
}

/**
 * Server options on top of the handler configuration.
 */
export interface ServerOptions {
  /**
   * Port to listen on.
   * @default 4000
   */
  readonly port?: number;

  /**
   * Host to bind to.
   * @default '0.0.0.0'
   */
  readonly host?: string;

  /**
   * Path the handler is mounted on.
   * @default '/graphql'
   */
  readonly path?: string;
}

export interface ServerConfig<TContext = BaseContext>
  extends HandlerConfig<TContext>,
    ServerOptions {}
