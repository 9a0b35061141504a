/**
 * @gqlserve/handler - Serve a prebuilt GraphQL schema over HTTP
 *
 * Accepts GET query strings and POST bodies in JSON, application/graphql,
 * URL-encoded and multipart form encodings, executes them with graphql-js
 * and answers with JSON or the GraphiQL console.
 */

export * from './handler';
export * from './request-options';
export * from './multipart';
export * from './execute';
export * from './render';
export * from './playground';
export * from './server';
export * from './context';
export * from './logger';
export * from './errors';
export * from './types';
