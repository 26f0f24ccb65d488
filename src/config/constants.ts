export const NOT_FOUND_PAGE = `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>Not found</title>
  </head>
  <body>
    <h1>404</h1>
    <p>Content not found.</p>
  </body>
</html>
`;

export const DEFAULT_INDEX_FILES: readonly string[] = ['index.html'];

export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';
