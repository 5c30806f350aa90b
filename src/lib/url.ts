import { ConfigError } from './errors.js';

export function parseHttpUrl(input: string, what: string): URL {
  let url: URL;
  try {
    url = new URL(input);
  } catch (err) {
    throw new ConfigError(`failed to parse ${what}: ${JSON.stringify(input)} is not a url`, { cause: err });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`failed to parse ${what}: unsupported scheme ${url.protocol}`);
  }
  return url;
}

// appends a path to the base url's own path; the base is left untouched
export function joinPath(base: URL, path: string): URL {
  const joined = new URL(base.href);
  const head = joined.pathname.replace(/\/+$/, '');
  const tail = path.replace(/^\/+/, '');
  joined.pathname = `${head}/${tail}`;
  joined.search = '';
  joined.hash = '';
  return joined;
}
