const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//iu;

/**
 * Prefixes a bare host or host:port with a scheme. Secure connections are assumed whenever
 * TLS material or certificate checking is in play.
 */
export const addUrlScheme = ({address, secure}: {address: string; secure: boolean}): string =>
  SCHEME_PATTERN.test(address) ? address : `${secure ? 'https' : 'http'}://${address}`;

export const resolveUrl = ({base, location}: {base: string; location: string}): string | undefined => {
  try {
    return new URL(location, base).toString();
  } catch {
    return undefined;
  }
};

export const trimTrailingSlash = (url: string): string => url.replace(/\/+$/u, '');
