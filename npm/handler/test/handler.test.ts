import { describe, it, expect, vi } from 'vitest';
import {
  GraphQLError,
  GraphQLID,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
} from 'graphql';
import type { GraphQLFormattedError } from 'graphql';
import { createHandler, createHandlerWithContext } from '../src/handler';
import { ConfigurationError } from '../src/errors';
import type { BaseContext, RequestOptions } from '../src/types';

interface Root {
  readonly greeting?: string;
  readonly files?: ReadonlyArray<string>;
}

const schema = new GraphQLSchema({
  query: new GraphQLObjectType({
    name: 'Query',
    fields: {
      hello: {
        type: GraphQLString,
        args: { name: { type: GraphQLString } },
        resolve: (_root: Root | undefined, args: { name?: string | null }) =>
          `Hello, ${args.name ?? 'world'}`,
      },
      greeting: {
        type: GraphQLString,
        resolve: (root: Root | undefined) => root?.greeting ?? null,
      },
      files: {
        type: new GraphQLList(new GraphQLNonNull(GraphQLString)),
        resolve: (root: Root | undefined) => root?.files ?? [],
      },
      method: {
        type: GraphQLString,
        resolve: (_root: Root | undefined, _args: unknown, context: BaseContext) =>
          context.request.method,
      },
      failing: {
        type: GraphQLString,
        resolve: () => {
          throw new Error('boom');
        },
      },
      alsoFailing: {
        type: GraphQLID,
        resolve: () => {
          throw new Error('bang');
        },
      },
    },
  }),
});

const ENDPOINT = 'http://localhost/graphql';

function get(query: string, headers?: Record<string, string>, extra = ''): Request {
  return new Request(`${ENDPOINT}?query=${encodeURIComponent(query)}${extra}`, { headers });
}

async function json(response: Response): Promise<{
  data?: Record<string, unknown> | null;
  errors?: GraphQLFormattedError[];
}> {
  return JSON.parse(await response.text());
}

describe('createHandler', () => {
  it('throws a ConfigurationError without a schema', () => {
    expect(() => Reflect.apply(createHandler, undefined, [{ pretty: true }])).toThrow(
      ConfigurationError
    );
    expect(() => Reflect.apply(createHandler, undefined, [{ pretty: true }])).toThrow(
      'Undefined GraphQL schema'
    );
  });

  it('applies defaults', () => {
    const handler = createHandler({ schema });

    expect(handler.config.title).toBe('GraphQL Playground');
    expect(handler.config.pretty).toBe(true);
    expect(handler.config.maxUploadMemorySize).toBe(10 * 1024 * 1024);
  });

  it('falls back to the default title for an empty title', () => {
    const handler = createHandler({ schema, title: '' });

    expect(handler.config.title).toBe('GraphQL Playground');
  });

  it('freezes the resolved configuration', () => {
    const handler = createHandler({ schema });

    expect(Object.isFrozen(handler.config)).toBe(true);
  });
});

describe('GraphQL handler', () => {
  describe('JSON responses', () => {
    it('writes indented JSON when pretty', async () => {
      const handler = createHandler({ schema, pretty: true, playground: false });

      const response = await handler.fetch(get('{ hello }'));

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Type')).toBe('application/json; charset=utf-8');
      expect(await response.text()).toBe('{\n\t"data": {\n\t\t"hello": "Hello, world"\n\t}\n}');
    });

    it('writes compact JSON otherwise', async () => {
      const handler = createHandler({ schema, pretty: false, playground: false });

      const response = await handler.fetch(get('{ hello }'));

      expect(await response.text()).toBe('{"data":{"hello":"Hello, world"}}');
    });

    it('decodes pretty and compact output to the same value', async () => {
      const pretty = createHandler({ schema, pretty: true, playground: false });
      const compact = createHandler({ schema, pretty: false, playground: false });
      const query = '{ hello(name: "Ada") failing }';

      const prettyBody = await json(await pretty.fetch(get(query)));
      const compactBody = await json(await compact.fetch(get(query)));

      expect(prettyBody).toEqual(compactBody);
      expect(prettyBody.data).toEqual({ hello: 'Hello, Ada', failing: null });
    });

    it('passes variables and operation name through', async () => {
      const handler = createHandler({ schema, pretty: false, playground: false });
      const request = new Request(ENDPOINT, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          query: 'query A { method } query B($name: String) { hello(name: $name) }',
          variables: { name: 'Grace' },
          operationName: 'B',
        }),
      });

      const body = await json(await handler.fetch(request));

      expect(body).toEqual({ data: { hello: 'Hello, Grace' } });
    });

    it('answers 200 with errors for an invalid query', async () => {
      const handler = createHandler({ schema, playground: false });

      const response = await handler.fetch(get('{ nope }'));
      const body = await json(response);

      expect(response.status).toBe(200);
      expect(body.errors?.map((error) => error.message)).toEqual([
        'Cannot query field "nope" on type "Query".',
      ]);
    });

    it('answers 200 with a syntax error when no query was found', async () => {
      const handler = createHandler({ schema, playground: false });

      const response = await handler.fetch(new Request(ENDPOINT));
      const body = await json(response);

      expect(response.status).toBe(200);
      expect(body.errors?.[0].message).toBe('Syntax Error: Unexpected <EOF>.');
    });

    it('executes with a base context by default', async () => {
      const handler = createHandler({ schema, pretty: false, playground: false });

      const body = await json(await handler.fetch(get('{ method }')));

      expect(body.data).toEqual({ method: 'GET' });
    });
  });

  describe('console page', () => {
    it('is served to browser navigations', async () => {
      const handler = createHandler({ schema, playground: true, title: 'Books & More' });

      const response = await handler.fetch(
        get('{ hello }', { Accept: 'text/html,application/xhtml+xml' })
      );
      const html = await response.text();

      expect(response.status).toBe(200);
      expect(response.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
      expect(html).toContain('<title>Books &amp; More</title>');
      expect(html).not.toContain('Hello, world');
    });

    it.each([
      { reason: 'the console is disabled', playground: false, accept: 'text/html', extra: '' },
      { reason: 'raw is requested', playground: true, accept: 'text/html', extra: '&raw' },
      {
        reason: 'JSON is accepted',
        playground: true,
        accept: 'text/html, application/json',
        extra: '',
      },
      { reason: 'HTML is not accepted', playground: true, accept: '*/*', extra: '' },
    ])('is not served when $reason', async ({ playground, accept, extra }) => {
      const handler = createHandler({ schema, playground, pretty: false });

      const response = await handler.fetch(get('{ hello }', { Accept: accept }, extra));

      expect(response.headers.get('Content-Type')).toBe('application/json; charset=utf-8');
      expect(await response.text()).toBe('{"data":{"hello":"Hello, world"}}');
    });
  });

  describe('error formatter', () => {
    it('replaces every error in order', async () => {
      const received: Error[] = [];
      const handler = createHandler({
        schema,
        pretty: false,
        playground: false,
        formatError: (error) => {
          received.push(error);
          return { message: `formatted: ${error.message}` };
        },
      });

      const body = await json(await handler.fetch(get('{ failing alsoFailing }')));

      expect(body.errors).toEqual([
        { message: 'formatted: boom' },
        { message: 'formatted: bang' },
      ]);
      expect(body.data).toEqual({ failing: null, alsoFailing: null });
      expect(received).toHaveLength(2);
      expect(received[0]).not.toBeInstanceOf(GraphQLError);
    });

    it('receives the GraphQL error when nothing was thrown by a resolver', async () => {
      const formatError = vi.fn((error: Error) => ({ message: error.message.toUpperCase() }));
      const handler = createHandler({ schema, playground: false, formatError });

      const body = await json(await handler.fetch(get('{ nope }')));

      expect(formatError).toHaveBeenCalledTimes(1);
      expect(formatError.mock.calls[0][0]).toBeInstanceOf(GraphQLError);
      expect(body.errors).toEqual([{ message: 'CANNOT QUERY FIELD "NOPE" ON TYPE "QUERY".' }]);
    });

    it('is not called for successful results', async () => {
      const formatError = vi.fn((error: Error) => ({ message: error.message }));
      const handler = createHandler({ schema, playground: false, formatError });

      await handler.fetch(get('{ hello }'));

      expect(formatError).not.toHaveBeenCalled();
    });
  });

  describe('hooks', () => {
    it('builds the root value from the context, request and options', async () => {
      const rootValue = vi.fn(
        (_context: BaseContext, _request: Request, options: RequestOptions) => ({
          greeting: `hi from ${options.operationName}`,
        })
      );
      const handler = createHandler({ schema, pretty: false, playground: false, rootValue });
      const request = get('query Greet { greeting }', undefined, '&operationName=Greet');

      const body = await json(await handler.fetch(request));

      expect(body.data).toEqual({ greeting: 'hi from Greet' });
      expect(rootValue).toHaveBeenCalledTimes(1);
      const [context, seenRequest, options] = rootValue.mock.calls[0];
      expect(seenRequest).toBe(request);
      expect(context.request.method).toBe('GET');
      expect(options.query).toBe('query Greet { greeting }');
    });

    it('exposes uploaded files to the root value builder', async () => {
      const handler = createHandler({
        schema,
        pretty: false,
        playground: false,
        rootValue: (_context, _request, options) => ({
          files: Object.values(options.uploadedFiles).flatMap((files) =>
            files.map((file) => file.name)
          ),
        }),
      });
      const form = new FormData();
      form.append('query', '{ files }');
      form.append('upload', new Blob(['a']), 'a.txt');
      form.append('upload', new Blob(['b']), 'b.txt');

      const body = await json(
        await handler.fetch(new Request(ENDPOINT, { method: 'POST', body: form }))
      );

      expect(body.data).toEqual({ files: ['a.txt', 'b.txt'] });
    });

    it('reads uploads larger than the memory limit from disk', async () => {
      const handler = createHandler({
        schema,
        pretty: false,
        playground: false,
        maxUploadMemorySize: 16,
        rootValue: async (_context, _request, options) => ({
          files: [await options.uploadedFiles.upload[0].text()],
        }),
      });
      const form = new FormData();
      form.append('query', '{ files }');
      form.append('upload', new Blob(['y'.repeat(100)]), 'large.txt');

      const body = await json(
        await handler.fetch(new Request(ENDPOINT, { method: 'POST', body: form }))
      );

      expect(body.data).toEqual({ files: ['y'.repeat(100)] });
    });

    it('passes the exact response bytes to onResult', async () => {
      const onResult = vi.fn();
      const handler = createHandler({ schema, pretty: true, playground: false, onResult });

      const response = await handler.fetch(get('{ hello }'));
      const text = await response.text();

      expect(onResult).toHaveBeenCalledTimes(1);
      const [context, params, result, bytes] = onResult.mock.calls[0];
      expect(new TextDecoder().decode(bytes)).toBe(text);
      expect(context.request.url).toBe(`${ENDPOINT}?query=${encodeURIComponent('{ hello }')}`);
      expect(params.source).toBe('{ hello }');
      expect(result).toEqual({ data: { hello: 'Hello, world' } });
    });

    it('does not call onResult when the console is served', async () => {
      const onResult = vi.fn();
      const handler = createHandler({ schema, playground: true, onResult });

      await handler.fetch(get('{ hello }', { Accept: 'text/html' }));

      expect(onResult).not.toHaveBeenCalled();
    });

    it('runs onBeforeResponse before rendering and keeps its headers', async () => {
      const calls: string[] = [];
      const handler = createHandler({
        schema,
        playground: false,
        onBeforeResponse: (_context, params, result, headers) => {
          calls.push(`before:${params.source}:${result.errors ? 'errors' : 'ok'}`);
          headers.set('X-Operation', 'hello');
        },
        onResult: () => {
          calls.push('result');
        },
      });

      const response = await handler.fetch(get('{ hello }'));

      expect(calls).toEqual(['before:{ hello }:ok', 'result']);
      expect(response.headers.get('X-Operation')).toBe('hello');
      expect(response.headers.get('Content-Type')).toBe('application/json; charset=utf-8');
    });

    it('keeps onBeforeResponse headers on the console page', async () => {
      const handler = createHandler({
        schema,
        playground: true,
        onBeforeResponse: (_context, _params, _result, headers) => {
          headers.set('Cache-Control', 'no-cache');
        },
      });

      const response = await handler.fetch(get('{ hello }', { Accept: 'text/html' }));

      expect(response.headers.get('Cache-Control')).toBe('no-cache');
      expect(response.headers.get('Content-Type')).toBe('text/html; charset=utf-8');
    });
  });
});

describe('createHandlerWithContext', () => {
  interface AppContext {
    readonly user: string;
  }

  const contextSchema = new GraphQLSchema({
    query: new GraphQLObjectType<unknown, AppContext>({
      name: 'Query',
      fields: {
        whoami: {
          type: GraphQLString,
          resolve: (_root, _args, context) => context.user,
        },
      },
    }),
  });

  it('builds the context with the factory', async () => {
    const handler = createHandlerWithContext<AppContext>({
      schema: contextSchema,
      pretty: false,
      playground: false,
      context: (request) => ({ user: request.headers.get('X-User') ?? 'anonymous' }),
    });

    const response = await handler.fetch(get('{ whoami }', { 'X-User': 'ada' }));

    expect(await response.text()).toBe('{"data":{"whoami":"ada"}}');
  });

  it('uses a caller supplied context with handle', async () => {
    const factory = vi.fn((): AppContext => ({ user: 'factory' }));
    const handler = createHandlerWithContext<AppContext>({
      schema: contextSchema,
      pretty: false,
      playground: false,
      context: factory,
    });

    const response = await handler.handle({ user: 'explicit' }, get('{ whoami }'));

    expect(await response.text()).toBe('{"data":{"whoami":"explicit"}}');
    expect(factory).not.toHaveBeenCalled();
  });
});
