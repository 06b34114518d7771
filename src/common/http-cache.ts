/** The part of an Express `Response` the cache helpers write to. */
export type HeaderSink = {
  setHeader(name: string, value: string): unknown;
};

/** Responses that must never be served from a browser or proxy cache. */
export function setNoStore(res: HeaderSink) {
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
  res.setHeader('Expires', '0');
}
