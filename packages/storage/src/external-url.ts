export interface ExternalUrlOptions {
  /** host:port the backend signs against, e.g. "minio:9000". */
  internalEndpoint: string;
  /** host:port reachable by clients, e.g. "files.example.com:9000". */
  externalEndpoint: string;
  secure: boolean;
}

/**
 * Point a presigned URL at the externally reachable endpoint.
 *
 * Only URLs whose host is the internal endpoint are rewritten. Path, query and
 * fragment are copied as already serialised, so existing percent-escapes are
 * never encoded a second time.
 */
export function toExternalUrl(url: string, options: ExternalUrlOptions): string {
  if (!URL.canParse(url)) {
    return url;
  }

  const parsed = new URL(url);
  if (parsed.host !== options.internalEndpoint) {
    return url;
  }

  const protocol = options.secure ? "https:" : "http:";
  return `${protocol}//${options.externalEndpoint}${parsed.pathname}${parsed.search}${parsed.hash}`;
}
