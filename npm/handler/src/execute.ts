/**
 * Runs resolved request options against the schema with graphql-js.
 */

import { graphql } from 'graphql';
import type { ExecutionResult, GraphQLSchema } from 'graphql';
import type {
  ExecutionParams,
  FormatErrorFn,
  HandlerResult,
  RequestOptions,
  RootValueFn,
} from './types';

export interface ExecuteRequestArgs<TContext> {
  readonly schema: GraphQLSchema;
  readonly options: RequestOptions;
  readonly context: TContext;
  readonly request: Request;
  readonly rootValue?: RootValueFn<TContext>;
  readonly formatError?: FormatErrorFn;
}

export interface ExecuteRequestOutcome {
  readonly params: ExecutionParams;
  readonly result: HandlerResult;
}

/**
 * Builds the graphql-js arguments for one request.
 */
export async function buildExecutionParams<TContext>(
  args: ExecuteRequestArgs<TContext>
): Promise<ExecutionParams> {
  const { schema, options, context, request, rootValue } = args;

  const params: ExecutionParams = {
    schema,
    source: options.query,
    variableValues: options.variables,
    operationName: options.operationName || undefined,
    contextValue: context,
  };

  if (rootValue) {
    return { ...params, rootValue: await rootValue(context, request, options) };
  }
  return params;
}

/**
 * Applies `formatError` to every error of a result, keeping order and count.
 * The formatter receives the error a resolver threw when there is one.
 */
export function formatResultErrors(
  result: ExecutionResult,
  formatError: FormatErrorFn
): HandlerResult {
  const { errors } = result;
  if (!errors || errors.length === 0) {
    return result;
  }
  return {
    ...result,
    errors: errors.map((error) => formatError(error.originalError ?? error)),
  };
}

/**
 * Executes a request. Query and resolver failures are reported in the
 * result's `errors`; this never produces an empty result.
 */
export async function executeRequest<TContext>(
  args: ExecuteRequestArgs<TContext>
): Promise<ExecuteRequestOutcome> {
  const params = await buildExecutionParams(args);
  const result = await graphql(params);

  return {
    params,
    result: args.formatError ? formatResultErrors(result, args.formatError) : result,
  };
}
