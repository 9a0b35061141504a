/**
 * GraphiQL console page.
 *
 * The page only carries its title. Query, variables and results live in the
 * browser; GraphiQL posts to the URL the page was loaded from.
 */

export interface PlaygroundConfig {
  /**
   * Page title.
   * @default 'GraphQL Playground'
   */
  readonly title?: string;
}

export const DEFAULT_PLAYGROUND_TITLE = 'GraphQL Playground';

/**
 * Generates the console HTML page.
 */
export function generatePlaygroundHTML(config: PlaygroundConfig = {}): string {
  const title = escapeHtml(config.title ?? DEFAULT_PLAYGROUND_TITLE);

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${title}</title>
  <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/graphiql@3/graphiql.min.css" />
  <style>
    * {
      margin: 0;
      padding: 0;
      box-sizing: border-box;
    }
    html, body, #graphiql {
      height: 100%;
      width: 100%;
    }
    body {
      background-color: rgb(23, 42, 58);
    }
    .loading {
      font-family: system-ui, -apple-system, BlinkMacSystemFont, sans-serif;
      font-size: 32px;
      font-weight: 200;
      color: rgba(255, 255, 255, .6);
      display: flex;
      align-items: center;
      justify-content: center;
      height: 100%;
    }
  </style>
</head>
<body>
  <div id="graphiql"><div class="loading">Loading ${title}</div></div>

  <script crossorigin src="https://cdn.jsdelivr.net/npm/react@18/umd/react.production.min.js"></script>
  <script crossorigin src="https://cdn.jsdelivr.net/npm/react-dom@18/umd/react-dom.production.min.js"></script>
  <script crossorigin src="https://cdn.jsdelivr.net/npm/graphiql@3/graphiql.min.js"></script>

  <script>
    const fetcher = GraphiQL.createFetcher({
      url: window.location.origin + window.location.pathname,
    });

    const root = ReactDOM.createRoot(document.getElementById('graphiql'));
    root.render(
      React.createElement(GraphiQL, {
        fetcher: fetcher,
        defaultEditorToolsVisibility: true,
        isHeadersEditorEnabled: true,
      })
    );
  </script>
</body>
</html>`;
}

/**
 * Checks if a request accepts HTML.
 */
export function acceptsHTML(headers: Headers): boolean {
  const accept = headers.get('Accept') || '';
  return accept.includes('text/html');
}

/**
 * Escapes HTML special characters.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
