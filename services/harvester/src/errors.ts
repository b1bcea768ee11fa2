export class HttpError extends Error {
  readonly name = 'HttpError';
  constructor(
    readonly status: number,
    readonly url: string,
    statusText = '',
  ) {
    super(`upstream_http_error: ${status}${statusText ? ` ${statusText}` : ''} (${url})`);
  }
}

export class XmlParseError extends Error {
  readonly name = 'XmlParseError';
  constructor(detail: string) {
    super(`xml_parse_failed: ${detail}`);
  }
}

// OWS ExceptionReport returned by the catalogue instead of search results.
export class CatalogueError extends Error {
  readonly name = 'CatalogueError';
  constructor(
    detail: string,
    readonly url: string,
  ) {
    super(`catalogue_request_failed: ${detail}`);
  }
}

export class UnsupportedModeError extends Error {
  readonly name = 'UnsupportedModeError';
  readonly code = 'unsupported_mode';
  constructor(
    readonly mode: string,
    readonly protocol: string,
  ) {
    super(`${mode} output for ${protocol} services has not been implemented`);
  }
}

export class ConfigError extends Error {
  readonly name = 'ConfigError';
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
