import path from 'node:path';

import mime from 'mime-types';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/** Extension to Content-Type lookup. Configured types win over the database. */
export class MimeTable {
  private readonly overrides: ReadonlyMap<string, string>;

  constructor(
    types: Readonly<Record<string, string>> = {},
    private readonly defaultType: string = DEFAULT_CONTENT_TYPE
  ) {
    this.overrides = new Map(
      Object.entries(types).map(
        ([ext, type]) => [ext.replace(/^\./, '').toLowerCase(), type] as const
      )
    );
  }

  lookup(filePath: string): string {
    const ext = path.extname(filePath).slice(1).toLowerCase();
    const override = this.overrides.get(ext);
    if (override) return override;
    if (!ext) return this.defaultType;
    return mime.contentType(ext) || this.defaultType;
  }
}
